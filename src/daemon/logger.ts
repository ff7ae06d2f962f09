import * as fs from "node:fs";
import * as path from "node:path";
import { getLauncherHome } from "../config/loader.js";
import { CONFIG_DEFAULTS } from "../config/types.js";

const LOG_BASENAME = "launcher";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface LoggerOptions {
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
}

/**
 * Synchronous launcher log with size-based rotation:
 * launcher.log, then launcher.1.log (newest) up to launcher.<maxLogFiles - 1>.log.
 *
 * Once the daemon is running its PID tags every line, so entries from
 * consecutive launches can be told apart.
 */
export class Logger {
    private readonly logDir: string;
    private readonly logFile: string;
    private readonly maxLogSize: number;
    private readonly maxLogFiles: number;
    private daemonPid: number | undefined;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir ?? path.join(getLauncherHome(), "logs");
        this.maxLogSize = (options.maxLogSizeMB ?? CONFIG_DEFAULTS.maxLogSizeMB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? CONFIG_DEFAULTS.maxLogFiles;
        this.logFile = path.join(this.logDir, `${LOG_BASENAME}.log`);
        fs.mkdirSync(this.logDir, { recursive: true });
    }

    getLogFilePath(): string {
        return this.logFile;
    }

    setDaemonPid(pid: number): void {
        this.daemonPid = pid;
    }

    info(message: string): void {
        this.write("INFO", message);
    }

    warn(message: string): void {
        this.write("WARN", message);
    }

    error(message: string): void {
        this.write("ERROR", message);
    }

    formatLine(level: LogLevel, message: string, now: Date = new Date()): string {
        const tag = this.daemonPid === undefined ? "" : ` [mpd:${this.daemonPid}]`;
        return `[${now.toISOString()}] [${level}]${tag} ${message}\n`;
    }

    private write(level: LogLevel, message: string): void {
        this.rotateIfNeeded();
        fs.appendFileSync(this.logFile, this.formatLine(level, message), "utf-8");
    }

    private rotatedPath(index: number): string {
        return path.join(this.logDir, `${LOG_BASENAME}.${index}.log`);
    }

    private rotateIfNeeded(): void {
        try {
            if (!fs.existsSync(this.logFile) || fs.statSync(this.logFile).size < this.maxLogSize) {
                return;
            }

            // The oldest slot is dropped, the rest move up one
            const oldest = this.rotatedPath(this.maxLogFiles - 1);
            if (this.maxLogFiles > 1 && fs.existsSync(oldest)) {
                fs.unlinkSync(oldest);
            }
            for (let i = this.maxLogFiles - 2; i > 0; i--) {
                if (fs.existsSync(this.rotatedPath(i))) {
                    fs.renameSync(this.rotatedPath(i), this.rotatedPath(i + 1));
                }
            }

            fs.renameSync(this.logFile, this.rotatedPath(1));
        } catch (err) {
            // Keep appending to the current file
            const message = err instanceof Error ? err.message : String(err);
            process.stderr.write(`Warning: log rotation failed: ${message}\n`);
        }
    }
}
