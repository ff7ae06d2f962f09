import type { RuntimeLayout } from "../config/types.js";
import { LaunchError, type LaunchStep } from "./errors.js";
import {
    buildDaemonInvocation,
    formatInvocation,
    handOff,
    type DaemonExit,
    type DaemonInvocation,
    type HandOffOptions,
} from "./handoff.js";
import { resolveLayout } from "./layout.js";
import type { Logger } from "./logger.js";
import { writeMpdConf } from "./mpd-conf.js";
import { resetRuntimeDirectory } from "./runtime-dir.js";

export interface LaunchContext {
    /** Directory the runtime directory is anchored in */
    scriptRoot: string;
    /** Home directory of the invoking user */
    homeDir: string;
    /** Daemon binary */
    daemon: string;
    /** Arguments forwarded to the daemon after the config path */
    daemonArgs?: readonly string[];
    logger?: Logger;
}

export interface PreparedLaunch {
    layout: RuntimeLayout;
    invocation: DaemonInvocation;
}

function runStep<T>(step: LaunchStep, fn: () => T): T {
    try {
        return fn();
    } catch (err) {
        throw new LaunchError(step, err);
    }
}

/**
 * Reset the runtime directory and write mpd.conf into it.
 * Throws a LaunchError naming the step that failed; nothing is spawned.
 */
export function prepareLaunch(context: LaunchContext): PreparedLaunch {
    const { logger } = context;
    const layout = resolveLayout(context.scriptRoot, context.homeDir);

    runStep("reset", () => resetRuntimeDirectory(layout));
    logger?.info(`Reset runtime directory: ${layout.runtimeDir}`);

    const configFile = runStep("write", () => writeMpdConf(layout));
    logger?.info(`Wrote daemon config: ${configFile}`);

    return {
        layout,
        invocation: buildDaemonInvocation(context.daemon, configFile, context.daemonArgs),
    };
}

/**
 * Prepare the runtime directory, then hand over to the daemon.
 * Resolves with the daemon's exit once it is gone.
 */
export async function launch(context: LaunchContext, options: HandOffOptions = {}): Promise<DaemonExit> {
    const { logger } = context;
    const { invocation } = prepareLaunch(context);
    logger?.info(`Starting daemon: ${formatInvocation(invocation)}`);

    const exit = await handOff(invocation, {
        ...options,
        onSpawn: (child) => {
            if (child.pid !== undefined) {
                logger?.setDaemonPid(child.pid);
                logger?.info(`Daemon running (PID: ${child.pid})`);
            }
            options.onSpawn?.(child);
        },
    });
    logger?.info(
        exit.signal !== null
            ? `Daemon terminated by ${exit.signal}`
            : `Daemon exited with status ${exit.code ?? "unknown"}`,
    );
    return exit;
}
