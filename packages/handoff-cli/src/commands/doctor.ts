import { Command, Option } from "clipanion";
import chalk from "chalk";
import { describeError } from "@handoff/core";
import { hasFailures, runDoctorChecks, type CheckStatus } from "../services/doctor.js";
import { HandoffCommand } from "./base.js";

const SYMBOLS: Record<CheckStatus, string> = {
  ok: chalk.green("✔"),
  warn: chalk.yellow("!"),
  fail: chalk.red("✖"),
  skip: chalk.dim("-"),
};

export class DoctorCommand extends HandoffCommand {
  static paths = [["doctor"]];

  static usage = Command.Usage({
    description: "Check that the project can be launched",
  });

  json = Option.Boolean("--json", false);

  async execute() {
    try {
      const { loaded, paths } = await this.resolveLaunchContext();
      const checks = await runDoctorChecks({ config: loaded.config, paths });
      const failed = hasFailures(checks);

      if (this.json) {
        const report = {
          base_dir: paths.baseDir,
          manifest: paths.manifestPath,
          entry_point: paths.entryPointPath,
          config_sources: loaded.sources,
          checks,
          ok: !failed,
        };
        this.context.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
      } else {
        this.context.stdout.write("Handoff Doctor\n==============\n\n");
        this.context.stdout.write(`Base directory: ${paths.baseDir}\n`);
        this.context.stdout.write(`Configuration: ${loaded.sources.join(" → ")}\n\n`);
        for (const check of checks) {
          const detail = check.detail ? ` — ${check.detail}` : "";
          this.context.stdout.write(`  ${SYMBOLS[check.status]} ${check.label}${detail}\n`);
        }
      }

      return failed ? 1 : 0;
    } catch (error) {
      this.context.stderr.write(`handoff doctor failed: ${describeError(error)}\n`);
      return 1;
    }
  }
}
