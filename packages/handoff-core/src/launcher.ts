import { loadLauncherConfig, type LauncherConfig, type LauncherConfigLayer } from "./config.js";
import { pauseMessage, resolveLocale } from "./locale.js";
import { waitForEnter } from "./pause.js";
import { expandArgs, resolveBaseDir, resolveBaseDirFromDirectory, resolveLaunchPaths } from "./paths.js";
import { execaRunner, skippedOutcome } from "./process.js";
import { clearTerminal } from "./terminal.js";
import type {
  ClearPhase,
  LaunchEvent,
  LaunchListener,
  LaunchPaths,
  LaunchReport,
  LaunchStreams,
  ProcessRunner,
  StepOutcome,
} from "./types.js";

export interface RunLauncherOptions {
  /** File the base directory is derived from. Defaults to the running script. */
  launcherPath?: string | URL;
  /** Explicit base directory; wins over `launcherPath`. */
  baseDir?: string;
  /** Fully resolved configuration. When omitted it is loaded from the base directory. */
  config?: LauncherConfig;
  configFile?: string;
  overrides?: LauncherConfigLayer;
  env?: NodeJS.ProcessEnv;
  /** User config file; `null` skips it. Defaults to the one derived from `env`. */
  userConfigPath?: string | null;
  cwd?: string;
  runner?: ProcessRunner;
  streams?: Partial<LaunchStreams>;
  onEvent?: LaunchListener;
}

export async function resolveLauncherBaseDir(options: Pick<RunLauncherOptions, "launcherPath" | "baseDir">): Promise<string> {
  if (options.baseDir) {
    return resolveBaseDirFromDirectory(options.baseDir);
  }
  const launcherPath = options.launcherPath ?? process.argv[1];
  if (!launcherPath) {
    // No script (REPL, `node -e`): the working directory is the launcher's home.
    return resolveBaseDirFromDirectory(process.cwd());
  }
  return resolveBaseDir(launcherPath);
}

export async function runLauncher(options: RunLauncherOptions = {}): Promise<LaunchReport> {
  const streams: LaunchStreams = {
    stdin: options.streams?.stdin ?? process.stdin,
    stdout: options.streams?.stdout ?? process.stdout,
  };
  const runner = options.runner ?? execaRunner;
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const emit = (event: LaunchEvent) => options.onEvent?.(event);

  // Nothing is written before every config layer has been read.
  const baseDir = await resolveLauncherBaseDir(options);
  const config =
    options.config ??
    loadLauncherConfig({
      baseDir,
      configFile: options.configFile,
      userConfigPath: options.userConfigPath,
      env,
      overrides: options.overrides,
    }).config;

  const clear = (phase: ClearPhase) => {
    if (!config.clearScreen) return;
    clearTerminal(streams.stdout);
    emit({ type: "clear", phase });
  };

  clear("start");

  const paths = resolveLaunchPaths(baseDir, config);
  emit({ type: "resolve", paths });

  const install = await installDependencies(config, paths, cwd, runner, emit);

  clear("handoff");

  const entryArgs = [...expandArgs(config.runtime.args, paths), paths.entryPointPath];
  emit({ type: "entry:start", command: config.runtime.command, args: entryArgs });
  const entry = await runner.run(config.runtime.command, entryArgs, { cwd, output: "inherit" });
  emit({ type: "entry:exit", outcome: entry });

  if (config.pause) {
    const message = pauseMessage(resolveLocale(config.locale, env));
    emit({ type: "pause", message });
    await waitForEnter(message, streams);
  }

  clear("exit");

  emit({ type: "exit", code: 0 });
  return { paths, install, entry, exitCode: 0 };
}

async function installDependencies(
  config: LauncherConfig,
  paths: LaunchPaths,
  cwd: string,
  runner: ProcessRunner,
  emit: (event: LaunchEvent) => void
): Promise<StepOutcome> {
  const args = expandArgs(config.installer.args, paths);
  if (!config.installer.enabled) {
    emit({ type: "install:skip", reason: "installation disabled" });
    return skippedOutcome(config.installer.command, args);
  }
  emit({ type: "install:start", command: config.installer.command, args });
  // The installer's result is recorded but never changes what happens next.
  const outcome = await runner.run(config.installer.command, args, { cwd, output: "quiet" });
  emit({ type: "install:exit", outcome });
  return outcome;
}
