export { loadConfig, validateConfig, getScriptRoot } from "./config/loader.js";
export { prepareLaunch, launch } from "./daemon/launcher.js";
export { renderMpdConf, writeMpdConf } from "./daemon/mpd-conf.js";
export { resolveLayout } from "./daemon/layout.js";
export { resetRuntimeDirectory } from "./daemon/runtime-dir.js";
export { buildDaemonInvocation, handOff } from "./daemon/handoff.js";
export { LaunchError } from "./daemon/errors.js";
export { Logger } from "./daemon/logger.js";
export type { LauncherConfig, RuntimeLayout } from "./config/types.js";
export type { LaunchContext, PreparedLaunch } from "./daemon/launcher.js";
export type { DaemonExit, DaemonInvocation, HandOffOptions, SpawnDaemon } from "./daemon/handoff.js";
export type { LaunchStep } from "./daemon/errors.js";
