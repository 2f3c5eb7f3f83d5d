import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { LauncherError, describeError } from "./errors.js";
import type { LaunchPaths } from "./types.js";

export type LaunchPathConfig = {
  manifest: string;
  entryPoint: string;
};

function toFilePath(launcherPath: string | URL): string {
  if (launcherPath instanceof URL) {
    return fileURLToPath(launcherPath);
  }
  if (launcherPath.startsWith("file:")) {
    return fileURLToPath(launcherPath);
  }
  return launcherPath;
}

/**
 * Directory holding the launcher file, absolute and with every symlink resolved.
 */
export async function resolveBaseDir(launcherPath: string | URL): Promise<string> {
  const file = toFilePath(launcherPath);
  try {
    const real = await fs.realpath(path.resolve(file));
    return path.dirname(real);
  } catch (error) {
    throw new LauncherError(
      "BASE_DIR_UNRESOLVED",
      `Unable to resolve launcher location ${file}: ${describeError(error)}`,
      { cause: error }
    );
  }
}

export async function resolveBaseDirFromDirectory(dir: string): Promise<string> {
  try {
    const real = await fs.realpath(path.resolve(dir));
    const stat = await fs.stat(real);
    if (!stat.isDirectory()) {
      throw new Error("not a directory");
    }
    return real;
  } catch (error) {
    throw new LauncherError(
      "BASE_DIR_UNRESOLVED",
      `Unable to resolve base directory ${dir}: ${describeError(error)}`,
      { cause: error }
    );
  }
}

export function resolveLaunchPaths(baseDir: string, config: LaunchPathConfig): LaunchPaths {
  return {
    baseDir,
    manifestPath: path.resolve(baseDir, config.manifest),
    entryPointPath: path.resolve(baseDir, config.entryPoint),
  };
}

const PLACEHOLDER_PATTERN = /\{(manifest|entryPoint|baseDir)\}/g;

export function expandArgs(args: readonly string[], paths: LaunchPaths): string[] {
  const values: Record<string, string> = {
    manifest: paths.manifestPath,
    entryPoint: paths.entryPointPath,
    baseDir: paths.baseDir,
  };
  return args.map(arg => arg.replace(PLACEHOLDER_PATTERN, (match, key: string) => values[key] ?? match));
}
