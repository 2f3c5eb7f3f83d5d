import { Command, Option } from "clipanion";
import chalk from "chalk";
import { describeError, isLauncherError, runLauncher, type LauncherConfigLayer } from "@handoff/core";
import { formatLaunchEvent } from "../services/events.js";
import { HandoffCommand } from "./base.js";

export class RunCommand extends HandoffCommand {
  static paths = [Command.Default, ["run"]];

  static usage = Command.Usage({
    description: "Install dependencies, run the entry point, then wait for Enter",
    details: `
      The project directory is given with \`--base-dir\`. Without it, the directory holding the running script is used, which for the installed binary is its own \`bin\` directory.
    `,
    examples: [
      ["Launch a project directory", "$0 --base-dir ./my-project"],
      ["Launch a project directory without reinstalling", "$0 run --base-dir ./app --skip-install"],
    ],
  });

  skipInstall = Option.Boolean("--skip-install", false, { description: "Do not run the installer" });

  clear = Option.Boolean("--clear", { description: "Clear the terminal between steps (--no-clear to disable)" });

  pause = Option.Boolean("--pause", { description: "Wait for Enter before exiting (--no-pause to disable)" });

  locale = Option.String("--locale", { description: "Prompt language: auto, en or ru" });

  verbose = Option.Boolean("--verbose", false, { description: "Log each launch step to stderr" });

  protected buildOverrides(): LauncherConfigLayer {
    const overrides: LauncherConfigLayer = {};
    if (this.skipInstall) {
      overrides.installer = { enabled: false };
    }
    if (this.clear !== undefined) {
      overrides.clearScreen = this.clear;
    }
    if (this.pause !== undefined) {
      overrides.pause = this.pause;
    }
    const locale = this.parseLocale(this.locale);
    if (locale) {
      overrides.locale = locale;
    }
    return overrides;
  }

  async execute() {
    try {
      await runLauncher({
        baseDir: this.baseDir,
        configFile: this.configFile,
        env: this.env,
        overrides: this.buildOverrides(),
        streams: { stdin: this.context.stdin, stdout: this.context.stdout },
        onEvent: this.verbose
          ? event => {
              this.context.stderr.write(`${chalk.dim(`[handoff] ${formatLaunchEvent(event)}`)}\n`);
            }
          : undefined,
      });
      return 0;
    } catch (error) {
      if (isLauncherError(error) && error.code === "INTERRUPTED") {
        return 130;
      }
      this.context.stderr.write(`handoff run failed: ${describeError(error)}\n`);
      return 1;
    }
  }
}
