import fs from "fs-extra";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { splitCommandLine } from "./command-line.js";
import { LauncherError, describeError } from "./errors.js";
import type { LocaleSetting } from "./locale.js";

const CommandSchema = z
  .object({
    command: z.string().min(1).optional(),
    args: z.array(z.string()).optional(),
  })
  .strict();

const InstallerSchema = CommandSchema.extend({
  enabled: z.boolean().optional(),
}).strict();

const ConfigLayerSchema = z
  .object({
    manifest: z.string().min(1).optional(),
    entryPoint: z.string().min(1).optional(),
    installer: InstallerSchema.optional(),
    runtime: CommandSchema.optional(),
    clearScreen: z.boolean().optional(),
    pause: z.boolean().optional(),
    locale: z.enum(["auto", "en", "ru"]).optional(),
  })
  .strict();

export type LauncherConfigLayer = z.infer<typeof ConfigLayerSchema>;

export interface LauncherConfig {
  manifest: string;
  entryPoint: string;
  installer: { enabled: boolean; command: string; args: string[] };
  runtime: { command: string; args: string[] };
  clearScreen: boolean;
  pause: boolean;
  locale: LocaleSetting;
}

export type ConfigSource = "defaults" | "user" | "project" | "file" | "env" | "cli";

export interface LoadedLauncherConfig {
  config: LauncherConfig;
  sources: ConfigSource[];
}

export interface LoadConfigOptions {
  baseDir: string;
  configFile?: string;
  userConfigPath?: string | null;
  env?: NodeJS.ProcessEnv;
  overrides?: LauncherConfigLayer;
}

export const PROJECT_CONFIG_FILENAME = "handoff.config.yaml";

/**
 * `$XDG_CONFIG_HOME/handoff/config.yaml`, falling back to `$HOME/.config`.
 * Returns null when the environment names neither directory.
 */
export function resolveUserConfigPath(env: NodeJS.ProcessEnv): string | null {
  const configHome = env.XDG_CONFIG_HOME?.trim() || (env.HOME?.trim() ? path.join(env.HOME.trim(), ".config") : "");
  if (!configHome) {
    return null;
  }
  return path.join(configHome, "handoff", "config.yaml");
}

const DEFAULT_LAUNCHER_CONFIG: LauncherConfig = {
  manifest: "requirements.txt",
  entryPoint: "src/main.py",
  installer: { enabled: true, command: "pip", args: ["install", "-r", "{manifest}"] },
  runtime: { command: "python3", args: [] },
  clearScreen: true,
  pause: true,
  locale: "auto",
};

function cloneDefaults(): LauncherConfig {
  return {
    ...DEFAULT_LAUNCHER_CONFIG,
    installer: { ...DEFAULT_LAUNCHER_CONFIG.installer, args: [...DEFAULT_LAUNCHER_CONFIG.installer.args] },
    runtime: { ...DEFAULT_LAUNCHER_CONFIG.runtime, args: [...DEFAULT_LAUNCHER_CONFIG.runtime.args] },
  };
}

export function parseBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (value === 1) return true;
    if (value === 0) return false;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (!normalized) return null;
    if (["1", "true", "yes", "y", "on"].includes(normalized)) {
      return true;
    }
    if (["0", "false", "no", "n", "off"].includes(normalized)) {
      return false;
    }
  }
  return null;
}

function readYamlFile(filePath: string, required: boolean): unknown {
  try {
    if (!fs.existsSync(filePath)) {
      if (required) {
        throw new Error("file not found");
      }
      return null;
    }
    const raw = fs.readFileSync(filePath, "utf8");
    if (!raw.trim()) {
      return null;
    }
    return YAML.parse(raw);
  } catch (error) {
    if (!required) {
      return null;
    }
    throw new LauncherError("CONFIG_INVALID", `Failed to read ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }
}

function parseLayer(raw: unknown, origin: string): LauncherConfigLayer {
  if (raw === null || raw === undefined) {
    return {};
  }
  const parsed = ConfigLayerSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new LauncherError("CONFIG_INVALID", `Invalid configuration in ${origin}: ${detail}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function parseCommandVariable(name: string, value: string | undefined): { command: string; args: string[] } | null {
  if (!value || !value.trim()) {
    return null;
  }
  let parts: string[];
  try {
    parts = splitCommandLine(value);
  } catch (error) {
    throw new LauncherError("CONFIG_INVALID", `Invalid ${name}: ${describeError(error)}`, { cause: error });
  }
  const [command, ...args] = parts;
  if (!command) {
    return null;
  }
  return { command, args };
}

export function readEnvLayer(env: NodeJS.ProcessEnv): LauncherConfigLayer {
  const layer: LauncherConfigLayer = {};

  const installer = parseCommandVariable("HANDOFF_INSTALLER", env.HANDOFF_INSTALLER);
  if (installer) {
    layer.installer = { ...installer };
  }
  const skipInstall = parseBoolean(env.HANDOFF_SKIP_INSTALL);
  if (skipInstall !== null) {
    layer.installer = { ...(layer.installer ?? {}), enabled: !skipInstall };
  }

  const runtime = parseCommandVariable("HANDOFF_RUNTIME", env.HANDOFF_RUNTIME);
  if (runtime) {
    layer.runtime = runtime;
  }

  const clearScreen = parseBoolean(env.HANDOFF_CLEAR);
  if (clearScreen !== null) {
    layer.clearScreen = clearScreen;
  }

  const locale = env.HANDOFF_LOCALE?.trim().toLowerCase();
  if (locale === "auto" || locale === "en" || locale === "ru") {
    layer.locale = locale;
  }

  return layer;
}

export function mergeConfigLayer(target: LauncherConfig, layer: LauncherConfigLayer): LauncherConfig {
  return {
    manifest: layer.manifest ?? target.manifest,
    entryPoint: layer.entryPoint ?? target.entryPoint,
    installer: {
      enabled: layer.installer?.enabled ?? target.installer.enabled,
      command: layer.installer?.command ?? target.installer.command,
      args: layer.installer?.args ? [...layer.installer.args] : target.installer.args,
    },
    runtime: {
      command: layer.runtime?.command ?? target.runtime.command,
      args: layer.runtime?.args ? [...layer.runtime.args] : target.runtime.args,
    },
    clearScreen: layer.clearScreen ?? target.clearScreen,
    pause: layer.pause ?? target.pause,
    locale: layer.locale ?? target.locale,
  };
}

function isEmptyLayer(layer: LauncherConfigLayer): boolean {
  return Object.keys(layer).length === 0;
}

export function loadLauncherConfig(options: LoadConfigOptions): LoadedLauncherConfig {
  let config = cloneDefaults();
  const sources: ConfigSource[] = ["defaults"];

  const apply = (layer: LauncherConfigLayer, source: ConfigSource) => {
    if (isEmptyLayer(layer)) return;
    config = mergeConfigLayer(config, layer);
    sources.push(source);
  };

  const env = options.env ?? process.env;
  const userConfigPath = options.userConfigPath === undefined ? resolveUserConfigPath(env) : options.userConfigPath;
  if (userConfigPath) {
    apply(parseLayer(readYamlFile(userConfigPath, false), userConfigPath), "user");
  }

  if (options.configFile) {
    const file = path.resolve(options.baseDir, options.configFile);
    apply(parseLayer(readYamlFile(file, true), file), "file");
  } else {
    const projectPath = path.join(options.baseDir, PROJECT_CONFIG_FILENAME);
    apply(parseLayer(readYamlFile(projectPath, false), projectPath), "project");
  }

  apply(readEnvLayer(env), "env");

  if (options.overrides) {
    apply(parseLayer(options.overrides, "command-line options"), "cli");
  }

  return { config, sources };
}

export { DEFAULT_LAUNCHER_CONFIG };
