export type {
  ClearPhase,
  LaunchEvent,
  LaunchListener,
  LaunchLocale,
  LaunchPaths,
  LaunchReport,
  LaunchStreams,
  ProcessOutput,
  ProcessRunner,
  ProcessRunOptions,
  StepOutcome,
} from "./types.js";
export type {
  ConfigSource,
  LauncherConfig,
  LauncherConfigLayer,
  LoadConfigOptions,
  LoadedLauncherConfig,
} from "./config.js";
export type { LocaleSetting } from "./locale.js";
export type { PausePrompt } from "./pause.js";
export type { InputEndWatch } from "./input-end.js";
export type { RunLauncherOptions } from "./launcher.js";
export type { LauncherErrorCode } from "./errors.js";

export { runLauncher, resolveLauncherBaseDir } from "./launcher.js";
export {
  DEFAULT_LAUNCHER_CONFIG,
  PROJECT_CONFIG_FILENAME,
  resolveUserConfigPath,
  loadLauncherConfig,
  mergeConfigLayer,
  parseBoolean,
  readEnvLayer,
} from "./config.js";
export { LauncherError, describeError, isLauncherError } from "./errors.js";
export { LOCALE_SETTINGS, detectLocale, pauseMessage, resolveLocale } from "./locale.js";
export { expandArgs, resolveBaseDir, resolveBaseDirFromDirectory, resolveLaunchPaths } from "./paths.js";
export { execaRunner, skippedOutcome } from "./process.js";
export { __resetPausePrompt, __setPausePrompt, waitForEnter } from "./pause.js";
export { watchInputEnd } from "./input-end.js";
export { CLEAR_SEQUENCE, clearTerminal } from "./terminal.js";
export { splitCommandLine } from "./command-line.js";
