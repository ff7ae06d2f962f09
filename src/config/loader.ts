import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import type { LauncherConfig } from "./types.js";
import { CONFIG_DEFAULTS } from "./types.js";

/**
 * Returns the directory the launcher package lives in. The runtime directory
 * and the optional settings file are anchored here.
 */
export function getScriptRoot(): string {
    return path.resolve(__dirname, "..", "..");
}

/**
 * Returns the launcher's own home directory: ~/.mpd-launcher
 */
export function getLauncherHome(homeDir: string = os.homedir()): string {
    return path.join(homeDir, CONFIG_DEFAULTS.launcherHomeName);
}

export function getSettingsPath(scriptRoot: string): string {
    return path.join(scriptRoot, CONFIG_DEFAULTS.settingsFileName);
}

function readNonEmptyString(raw: Record<string, unknown>, key: string, fallback: string): string {
    const value = raw[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (typeof value !== "string" || value.trim() === "") {
        throw new Error(`${key} must be a non-empty string`);
    }
    return value.trim();
}

function readNumber(raw: Record<string, unknown>, key: string, fallback: number): number {
    const value = raw[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (typeof value !== "number") {
        throw new Error(`${key} must be a number`);
    }
    // YAML accepts .nan and .inf
    if (!Number.isFinite(value)) {
        throw new Error(`${key} must be a finite number`);
    }
    return value;
}

function isInside(dir: string, candidate: string): boolean {
    const relative = path.relative(dir, candidate);
    return relative === "" || (relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

/**
 * Validate a parsed settings object. Throws on invalid settings.
 * @param homeDir Used for the default log directory
 * @param scriptRoot Relative paths resolve against it; the runtime directory under it is off limits
 */
export function validateConfig(
    config: unknown,
    homeDir: string = os.homedir(),
    scriptRoot: string = getScriptRoot(),
): LauncherConfig {
    // An empty file parses to null
    if (config === null || config === undefined) {
        config = {};
    }
    if (typeof config !== "object" || Array.isArray(config)) {
        throw new Error("Settings must be a YAML object");
    }

    const raw = config as Record<string, unknown>;

    const daemon = readNonEmptyString(raw, "daemon", CONFIG_DEFAULTS.daemon);
    const logDir = path.resolve(
        scriptRoot,
        readNonEmptyString(raw, "logDir", path.join(getLauncherHome(homeDir), "logs")),
    );
    // The reset would wipe it, or leave the log behind next to mpd.conf
    if (isInside(path.join(scriptRoot, CONFIG_DEFAULTS.runtimeDirName), logDir)) {
        throw new Error("logDir must not be inside the runtime directory");
    }

    const maxLogSizeMB = readNumber(raw, "maxLogSizeMB", CONFIG_DEFAULTS.maxLogSizeMB);
    if (maxLogSizeMB <= 0) {
        throw new Error("maxLogSizeMB must be a positive number");
    }

    const maxLogFiles = readNumber(raw, "maxLogFiles", CONFIG_DEFAULTS.maxLogFiles);
    if (maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
        throw new Error("maxLogFiles must be a positive integer");
    }

    return { daemon, logDir, maxLogSizeMB, maxLogFiles };
}

/**
 * Load launcher settings from mpd-launcher.yml in the script root.
 * A missing file yields the defaults.
 */
export function loadConfig(scriptRoot: string = getScriptRoot(), homeDir: string = os.homedir()): LauncherConfig {
    const settingsPath = getSettingsPath(scriptRoot);

    if (!fs.existsSync(settingsPath)) {
        return validateConfig({}, homeDir, scriptRoot);
    }

    const raw = fs.readFileSync(settingsPath, "utf-8");
    let parsed: unknown;
    try {
        parsed = yaml.parse(raw);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`Invalid YAML in ${settingsPath}: ${message}`);
    }
    return validateConfig(parsed, homeDir, scriptRoot);
}
