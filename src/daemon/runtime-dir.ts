import * as fs from "node:fs";
import type { RuntimeLayout } from "../config/types.js";

/**
 * Delete the runtime directory with everything in it, then recreate it
 * with an empty playlist directory. Missing parents are created.
 */
export function resetRuntimeDirectory(layout: RuntimeLayout): void {
    fs.rmSync(layout.runtimeDir, { recursive: true, force: true });
    fs.mkdirSync(layout.playlistDir, { recursive: true });
}
