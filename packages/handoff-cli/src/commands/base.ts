import { Command, Option } from "clipanion";
import {
  LOCALE_SETTINGS,
  loadLauncherConfig,
  resolveLaunchPaths,
  resolveLauncherBaseDir,
  type LaunchPaths,
  type LauncherConfigLayer,
  type LoadedLauncherConfig,
  type LocaleSetting,
} from "@handoff/core";

export type LaunchContext = {
  baseDir: string;
  loaded: LoadedLauncherConfig;
  paths: LaunchPaths;
};

function isLocaleSetting(value: string): value is LocaleSetting {
  return LOCALE_SETTINGS.some(setting => setting === value);
}

export abstract class HandoffCommand extends Command {
  baseDir = Option.String("--base-dir", {
    description: "Project directory (defaults to the directory holding the handoff binary)",
  });

  configFile = Option.String("--config", {
    description: "Configuration file to use instead of handoff.config.yaml",
  });

  protected buildOverrides(): LauncherConfigLayer {
    return {};
  }

  protected parseLocale(value: string | undefined): LocaleSetting | undefined {
    if (value === undefined) {
      return undefined;
    }
    const normalized = value.trim().toLowerCase();
    if (!isLocaleSetting(normalized)) {
      throw new Error(`Unknown locale '${value}'. Use ${LOCALE_SETTINGS.join(", ")}.`);
    }
    return normalized;
  }

  /** Environment the config layers and locale are read from; the user config is located through it too. */
  protected get env(): NodeJS.ProcessEnv {
    return this.context.env;
  }

  protected async resolveLaunchContext(): Promise<LaunchContext> {
    const baseDir = await resolveLauncherBaseDir({ baseDir: this.baseDir });
    const loaded = loadLauncherConfig({
      baseDir,
      configFile: this.configFile,
      env: this.env,
      overrides: this.buildOverrides(),
    });
    return { baseDir, loaded, paths: resolveLaunchPaths(baseDir, loaded.config) };
  }
}
