import fs from "fs-extra";
import { execa } from "execa";
import type { LaunchPaths, LauncherConfig } from "@handoff/core";

export type CheckStatus = "ok" | "warn" | "fail" | "skip";

export type DoctorCheck = {
  label: string;
  status: CheckStatus;
  detail?: string;
};

export type VersionCheckResult = { ok: boolean; output: string };

export type VersionCheck = (command: string, args: string[], cwd: string) => Promise<VersionCheckResult>;

export const runVersionCheck: VersionCheck = async (command, args, cwd) => {
  const result = await execa(command, args, { cwd, reject: false, stdin: "ignore" });
  const output = [result.stdout, result.stderr]
    .filter((part): part is string => typeof part === "string" && part.length > 0)
    .join("\n")
    .trim();
  if (result.failed) {
    const reason = "shortMessage" in result && typeof result.shortMessage === "string" ? result.shortMessage : "";
    return { ok: false, output: (reason || output).split("\n")[0] ?? "" };
  }
  return { ok: true, output: output.split("\n")[0] ?? "" };
};

export type DoctorOptions = {
  config: LauncherConfig;
  paths: LaunchPaths;
  cwd?: string;
  versionCheck?: VersionCheck;
};

async function fileCheck(label: string, filePath: string, missing: CheckStatus): Promise<DoctorCheck> {
  const exists = await fs.pathExists(filePath);
  return exists ? { label, status: "ok", detail: filePath } : { label, status: missing, detail: `Missing ${filePath}` };
}

async function commandCheck(
  label: string,
  command: string,
  versionCheck: VersionCheck,
  cwd: string,
  failure: CheckStatus
): Promise<DoctorCheck> {
  const result = await versionCheck(command, ["--version"], cwd);
  if (result.ok) {
    return { label, status: "ok", detail: result.output || command };
  }
  return { label, status: failure, detail: result.output || `${command} is not runnable` };
}

export async function runDoctorChecks(options: DoctorOptions): Promise<DoctorCheck[]> {
  const versionCheck = options.versionCheck ?? runVersionCheck;
  const cwd = options.cwd ?? process.cwd();
  const { config, paths } = options;

  const checks: DoctorCheck[] = [];
  checks.push(await fileCheck("Entry point present", paths.entryPointPath, "fail"));
  checks.push(await fileCheck("Dependency manifest present", paths.manifestPath, "warn"));
  checks.push(await commandCheck(`Runtime '${config.runtime.command}' runs`, config.runtime.command, versionCheck, cwd, "fail"));
  if (config.installer.enabled) {
    checks.push(
      await commandCheck(`Installer '${config.installer.command}' runs`, config.installer.command, versionCheck, cwd, "warn")
    );
  } else {
    checks.push({ label: `Installer '${config.installer.command}' runs`, status: "skip", detail: "installation disabled" });
  }
  return checks;
}

export function hasFailures(checks: DoctorCheck[]): boolean {
  return checks.some(check => check.status === "fail");
}
