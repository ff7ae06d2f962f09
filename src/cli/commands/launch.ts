import * as os from "node:os";
import * as path from "node:path";
import { getScriptRoot, loadConfig } from "../../config/loader.js";
import type { LauncherConfig } from "../../config/types.js";
import { LaunchError } from "../../daemon/errors.js";
import { formatInvocation, type DaemonExit, type HandOffOptions } from "../../daemon/handoff.js";
import { launch, prepareLaunch, type LaunchContext } from "../../daemon/launcher.js";
import { resolveLayout } from "../../daemon/layout.js";
import { Logger } from "../../daemon/logger.js";

export interface LaunchOptions {
    root?: string;
    daemon?: string;
    dryRun?: boolean;
    printSocket?: boolean;
}

export interface LaunchDeps extends HandOffOptions {
    homeDir?: string;
    createLogger?: (config: LauncherConfig) => Logger;
}

function defaultLogger(config: LauncherConfig): Logger {
    return new Logger({
        logDir: config.logDir,
        maxLogSizeMB: config.maxLogSizeMB,
        maxLogFiles: config.maxLogFiles,
    });
}

/**
 * Carry out one launcher run. Resolves with how the daemon ended; a dry run
 * or --print-socket resolves with status 0 without starting anything.
 */
export async function runLaunch(
    daemonArgs: string[],
    options: LaunchOptions,
    deps: LaunchDeps = {},
): Promise<DaemonExit> {
    const scriptRoot = path.resolve(options.root ?? getScriptRoot());
    const homeDir = deps.homeDir ?? os.homedir();

    if (options.printSocket) {
        console.log(resolveLayout(scriptRoot, homeDir).socketFile);
        return { code: 0, signal: null };
    }

    let config: LauncherConfig;
    try {
        config = loadConfig(scriptRoot, homeDir);
    } catch (err) {
        throw new LaunchError("settings", err);
    }

    const logger = (deps.createLogger ?? defaultLogger)(config);
    const context: LaunchContext = {
        scriptRoot,
        homeDir,
        daemon: options.daemon ?? config.daemon,
        daemonArgs,
        logger,
    };

    try {
        if (options.dryRun) {
            const { invocation } = prepareLaunch(context);
            console.log(formatInvocation(invocation));
            return { code: 0, signal: null };
        }
        return await launch(context, { spawn: deps.spawn, signalSource: deps.signalSource });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        try {
            logger.error(`Launch failed: ${message}`);
        } catch (logErr) {
            // The launch failure is what the caller needs to see
            const logMessage = logErr instanceof Error ? logErr.message : String(logErr);
            process.stderr.write(`Warning: could not write launcher log: ${logMessage}\n`);
        }
        throw err;
    }
}

export async function launchCommand(daemonArgs: string[], options: LaunchOptions): Promise<void> {
    try {
        const exit = await runLaunch(daemonArgs, options);
        if (exit.signal !== null) {
            // Die the way the daemon died
            process.exitCode = 1;
            process.kill(process.pid, exit.signal);
            return;
        }
        process.exit(exit.code ?? 1);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(err instanceof LaunchError ? err.exitCode : 1);
    }
}
