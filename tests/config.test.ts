import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { loadConfig, validateConfig, getScriptRoot, getSettingsPath } from "../src/config/loader.js";

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "mpd-launcher-test-"));
}

function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

const HOME = "/home/alice";

describe("Config Loader", () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = createTempDir();
    });

    afterEach(() => {
        cleanupDir(tempDir);
    });

    describe("getScriptRoot", () => {
        it("should resolve to the package directory", () => {
            const root = getScriptRoot();
            expect(fs.existsSync(path.join(root, "src", "config", "loader.ts"))).toBe(true);
        });
    });

    describe("loadConfig", () => {
        it("should return defaults when no settings file exists", () => {
            const config = loadConfig(tempDir, HOME);
            expect(config).toEqual({
                daemon: "mpd",
                logDir: path.join(HOME, ".mpd-launcher", "logs"),
                maxLogSizeMB: 10,
                maxLogFiles: 5,
            });
        });

        it("should read overrides from mpd-launcher.yml", () => {
            fs.writeFileSync(
                getSettingsPath(tempDir),
                ["daemon: /usr/local/bin/mpd", "logDir: /var/tmp/launcher-logs", "maxLogFiles: 2"].join("\n") + "\n",
                "utf-8",
            );
            const config = loadConfig(tempDir, HOME);
            expect(config.daemon).toBe("/usr/local/bin/mpd");
            expect(config.logDir).toBe("/var/tmp/launcher-logs");
            expect(config.maxLogFiles).toBe(2);
            expect(config.maxLogSizeMB).toBe(10);
        });

        it("should treat an empty settings file as defaults", () => {
            fs.writeFileSync(getSettingsPath(tempDir), "", "utf-8");
            expect(loadConfig(tempDir, HOME).daemon).toBe("mpd");
        });

        it("should reject malformed YAML", () => {
            fs.writeFileSync(getSettingsPath(tempDir), "daemon: [unclosed\n", "utf-8");
            expect(() => loadConfig(tempDir, HOME)).toThrow("Invalid YAML");
        });
    });

    describe("validateConfig", () => {
        it("should trim string values", () => {
            const config = validateConfig({ daemon: "  mpd-git  " }, HOME);
            expect(config.daemon).toBe("mpd-git");
        });

        it("should ignore unknown keys", () => {
            const config = validateConfig({ colour: "blue" }, HOME);
            expect(config.daemon).toBe("mpd");
        });

        it("should reject non-object settings", () => {
            expect(() => validateConfig("string", HOME)).toThrow("must be a YAML object");
        });

        it("should reject a list", () => {
            expect(() => validateConfig(["mpd"], HOME)).toThrow("must be a YAML object");
        });

        it("should reject an empty daemon", () => {
            expect(() => validateConfig({ daemon: " " }, HOME)).toThrow("daemon must be a non-empty string");
        });

        it("should reject a non-string logDir", () => {
            expect(() => validateConfig({ logDir: 7 }, HOME)).toThrow("logDir must be a non-empty string");
        });

        it("should reject non-numeric maxLogSizeMB", () => {
            expect(() => validateConfig({ maxLogSizeMB: "big" }, HOME)).toThrow("maxLogSizeMB must be a number");
        });

        it("should reject non-positive maxLogSizeMB", () => {
            expect(() => validateConfig({ maxLogSizeMB: 0 }, HOME)).toThrow(
                "maxLogSizeMB must be a positive number",
            );
        });

        it("should reject non-integer maxLogFiles", () => {
            expect(() => validateConfig({ maxLogFiles: 2.5 }, HOME)).toThrow(
                "maxLogFiles must be a positive integer",
            );
        });
        it("should reject NaN and infinite numbers", () => {
            expect(() => validateConfig({ maxLogSizeMB: NaN }, HOME)).toThrow("maxLogSizeMB must be a finite number");
            expect(() => validateConfig({ maxLogFiles: Infinity }, HOME)).toThrow(
                "maxLogFiles must be a finite number",
            );
        });

        it("should resolve a relative logDir against the script root", () => {
            const config = validateConfig({ logDir: "logs" }, HOME, "/opt/app");
            expect(config.logDir).toBe("/opt/app/logs");
        });

        it("should reject a logDir that is the runtime directory", () => {
            expect(() => validateConfig({ logDir: ".mpd" }, HOME, "/opt/app")).toThrow(
                "logDir must not be inside the runtime directory",
            );
        });

        it("should reject a logDir below the runtime directory", () => {
            expect(() => validateConfig({ logDir: "/opt/app/.mpd/logs" }, HOME, "/opt/app")).toThrow(
                "logDir must not be inside the runtime directory",
            );
        });

        it("should accept a logDir whose name only starts like the runtime directory", () => {
            const config = validateConfig({ logDir: "/opt/app/.mpd-logs" }, HOME, "/opt/app");
            expect(config.logDir).toBe("/opt/app/.mpd-logs");
        });
    });

    describe("loadConfig with YAML special numbers", () => {
        it("should reject .nan", () => {
            fs.writeFileSync(getSettingsPath(tempDir), "maxLogSizeMB: .nan\n", "utf-8");
            expect(() => loadConfig(tempDir, HOME)).toThrow("maxLogSizeMB must be a finite number");
        });

        it("should reject .inf", () => {
            fs.writeFileSync(getSettingsPath(tempDir), "maxLogSizeMB: .inf\n", "utf-8");
            expect(() => loadConfig(tempDir, HOME)).toThrow("maxLogSizeMB must be a finite number");
        });
    });
});
