import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { resolveLayout } from "../src/daemon/layout.js";
import { resetRuntimeDirectory } from "../src/daemon/runtime-dir.js";

describe("resetRuntimeDirectory", () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mpd-launcher-reset-"));
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    function expectFreshRuntimeDir(runtimeDir: string): void {
        expect(fs.readdirSync(runtimeDir)).toEqual(["playlists"]);
        expect(fs.readdirSync(path.join(runtimeDir, "playlists"))).toEqual([]);
    }

    it("should create the runtime directory when absent", () => {
        const layout = resolveLayout(tempDir, "/home/alice");
        resetRuntimeDirectory(layout);
        expectFreshRuntimeDir(layout.runtimeDir);
    });

    it("should create missing parent directories", () => {
        const layout = resolveLayout(path.join(tempDir, "a", "b"), "/home/alice");
        resetRuntimeDirectory(layout);
        expectFreshRuntimeDir(layout.runtimeDir);
    });

    it("should wipe a populated runtime directory", () => {
        const layout = resolveLayout(tempDir, "/home/alice");
        fs.mkdirSync(path.join(layout.playlistDir, "nested"), { recursive: true });
        fs.writeFileSync(path.join(layout.playlistDir, "old.m3u"), "song.flac\n");
        fs.writeFileSync(path.join(layout.runtimeDir, "mpd.db"), "stale");
        fs.writeFileSync(path.join(layout.runtimeDir, "mpdstate"), "stale");

        resetRuntimeDirectory(layout);

        expectFreshRuntimeDir(layout.runtimeDir);
    });

    it("should leave siblings of the runtime directory alone", () => {
        fs.writeFileSync(path.join(tempDir, "keep.txt"), "keep");
        const layout = resolveLayout(tempDir, "/home/alice");

        resetRuntimeDirectory(layout);

        expect(fs.readFileSync(path.join(tempDir, "keep.txt"), "utf-8")).toBe("keep");
    });

    it("should throw when the script root is a file", () => {
        const file = path.join(tempDir, "not-a-dir");
        fs.writeFileSync(file, "");
        expect(() => resetRuntimeDirectory(resolveLayout(file, "/home/alice"))).toThrow();
    });
});
