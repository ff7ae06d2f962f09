import * as path from "node:path";
import type { RuntimeLayout } from "../config/types.js";
import { CONFIG_DEFAULTS } from "../config/types.js";

/**
 * Compute the runtime layout for a launcher anchored at `scriptRoot`.
 * Nothing is checked on disk; `musicDir` in particular may not exist.
 */
export function resolveLayout(scriptRoot: string, homeDir: string): RuntimeLayout {
    const runtimeDir = path.join(scriptRoot, CONFIG_DEFAULTS.runtimeDirName);

    return {
        runtimeDir,
        playlistDir: path.join(runtimeDir, CONFIG_DEFAULTS.playlistDirName),
        configFile: path.join(runtimeDir, CONFIG_DEFAULTS.configFileName),
        socketFile: path.join(runtimeDir, CONFIG_DEFAULTS.socketFileName),
        pidFile: path.join(runtimeDir, CONFIG_DEFAULTS.pidFileName),
        dbFile: path.join(runtimeDir, CONFIG_DEFAULTS.dbFileName),
        stateFile: path.join(runtimeDir, CONFIG_DEFAULTS.stateFileName),
        musicDir: path.join(homeDir, CONFIG_DEFAULTS.musicDirName),
    };
}
