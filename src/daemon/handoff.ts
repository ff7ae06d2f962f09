/**
 * Hand the launcher over to the daemon.
 *
 * Node cannot replace its own process image, so the daemon runs as a child
 * that inherits the launcher's stdio. Termination signals sent to the
 * launcher are passed on, and the daemon's exit status becomes the
 * launcher's.
 */
import * as child_process from "node:child_process";
import { CONFIG_DEFAULTS } from "../config/types.js";
import { LaunchError } from "./errors.js";

/** The command line the daemon is started with */
export interface DaemonInvocation {
    command: string;
    args: string[];
}

/** The part of a child process the handoff relies on */
export interface DaemonProcess {
    readonly pid?: number | undefined;
    kill(signal?: NodeJS.Signals | number): boolean;
    once(event: "error", listener: (err: Error) => void): unknown;
    once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnDaemon = (command: string, args: readonly string[]) => DaemonProcess;

/** Something termination signals arrive on (the launcher's own process by default) */
export interface SignalSource {
    on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
    removeListener(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface HandOffOptions {
    spawn?: SpawnDaemon;
    signalSource?: SignalSource;
    /** Called once the daemon process has been created */
    onSpawn?: (child: DaemonProcess) => void;
}

/** How the daemon ended: exactly one of `code` and `signal` is set */
export interface DaemonExit {
    code: number | null;
    signal: NodeJS.Signals | null;
}

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP", "SIGQUIT"];

/**
 * Build the daemon's command line: foreground flag, config path, then the
 * caller's arguments unchanged.
 */
export function buildDaemonInvocation(
    daemon: string,
    configFile: string,
    extraArgs: readonly string[] = [],
): DaemonInvocation {
    return {
        command: daemon,
        args: [CONFIG_DEFAULTS.foregroundFlag, configFile, ...extraArgs],
    };
}

/**
 * Render an invocation as a single line for logs and --dry-run output.
 */
export function formatInvocation(invocation: DaemonInvocation): string {
    return [invocation.command, ...invocation.args].join(" ");
}

export const spawnInherited: SpawnDaemon = (command, args) =>
    child_process.spawn(command, args, { stdio: "inherit" });

/**
 * Start the daemon and resolve once it exits. Rejects with a LaunchError
 * (step "spawn") if the binary cannot be started.
 */
export function handOff(invocation: DaemonInvocation, options: HandOffOptions = {}): Promise<DaemonExit> {
    const spawn = options.spawn ?? spawnInherited;
    const signalSource: SignalSource = options.signalSource ?? process;

    return new Promise<DaemonExit>((resolve, reject) => {
        let child: DaemonProcess;
        try {
            child = spawn(invocation.command, invocation.args);
        } catch (err) {
            reject(new LaunchError("spawn", err));
            return;
        }
        options.onSpawn?.(child);

        const forward = (signal: NodeJS.Signals): void => {
            child.kill(signal);
        };
        for (const signal of FORWARDED_SIGNALS) {
            signalSource.on(signal, forward);
        }
        const detach = (): void => {
            for (const signal of FORWARDED_SIGNALS) {
                signalSource.removeListener(signal, forward);
            }
        };

        child.once("error", (err) => {
            detach();
            reject(new LaunchError("spawn", err));
        });
        child.once("exit", (code, signal) => {
            detach();
            resolve({ code, signal });
        });
    });
}
