/**
 * Launcher settings (maps to mpd-launcher.yml in the script root).
 */
export interface LauncherConfig {
    /** Daemon binary, looked up on PATH unless it contains a slash */
    daemon: string;
    /** Directory the launcher log is written to */
    logDir: string;
    /** Maximum size of a single log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep (default: 5) */
    maxLogFiles: number;
}

/**
 * Every path the launcher derives from the script root and the home directory.
 * All entries but `musicDir` live under `runtimeDir`.
 */
export interface RuntimeLayout {
    runtimeDir: string;
    playlistDir: string;
    configFile: string;
    socketFile: string;
    pidFile: string;
    dbFile: string;
    stateFile: string;
    musicDir: string;
}

/** Default values and fixed names */
export const CONFIG_DEFAULTS = {
    daemon: "mpd",
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    settingsFileName: "mpd-launcher.yml",
    launcherHomeName: ".mpd-launcher",
    runtimeDirName: ".mpd",
    playlistDirName: "playlists",
    configFileName: "mpd.conf",
    socketFileName: "mpd.sock",
    pidFileName: "mpd.pid",
    dbFileName: "mpd.db",
    stateFileName: "mpdstate",
    musicDirName: "Music",
    foregroundFlag: "--no-daemon",
} as const;
