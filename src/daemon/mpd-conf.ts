import * as fs from "node:fs";
import type { RuntimeLayout } from "../config/types.js";

/**
 * Render mpd.conf for a layout. Values go in verbatim between double quotes.
 */
export function renderMpdConf(layout: RuntimeLayout): string {
    return [
        `bind_to_address "${layout.socketFile}"`,
        `# pid_file "${layout.pidFile}"`,
        `db_file "${layout.dbFile}"`,
        `state_file "${layout.stateFile}"`,
        `playlist_directory "${layout.playlistDir}"`,
        `music_directory "${layout.musicDir}"`,
    ].join("\n") + "\n";
}

/**
 * Write mpd.conf into the runtime directory, replacing any previous one.
 * @returns The path of the written file
 */
export function writeMpdConf(layout: RuntimeLayout): string {
    fs.writeFileSync(layout.configFile, renderMpdConf(layout), "utf-8");
    return layout.configFile;
}
