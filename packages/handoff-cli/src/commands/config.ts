import { Option } from "clipanion";
import { describeError } from "@handoff/core";
import { HandoffCommand } from "./base.js";

function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

export class ConfigPrintCommand extends HandoffCommand {
  static paths = [["config", "print"]];

  json = Option.Boolean("--json", false);

  async execute() {
    try {
      const { loaded, paths } = await this.resolveLaunchContext();
      const { config, sources } = loaded;

      if (this.json) {
        this.context.stdout.write(`${JSON.stringify({ config, sources, paths }, null, 2)}\n`);
        return 0;
      }

      this.context.stdout.write("Handoff Configuration\n=====================\n\n");
      this.context.stdout.write(`Sources: ${sources.join(", ")}\n`);
      this.context.stdout.write(`Base directory: ${paths.baseDir}\n`);
      this.context.stdout.write(`Manifest: ${paths.manifestPath}\n`);
      this.context.stdout.write(`Entry point: ${paths.entryPointPath}\n`);
      this.context.stdout.write(
        `Installer: ${config.installer.enabled ? formatCommand(config.installer.command, config.installer.args) : "disabled"}\n`
      );
      this.context.stdout.write(`Runtime: ${formatCommand(config.runtime.command, config.runtime.args)}\n`);
      this.context.stdout.write(`Clear screen: ${config.clearScreen ? "yes" : "no"}\n`);
      this.context.stdout.write(`Pause before exit: ${config.pause ? "yes" : "no"}\n`);
      this.context.stdout.write(`Locale: ${config.locale}\n`);
      this.context.stdout.write("\nUse --json for a machine-readable view.\n");
      return 0;
    } catch (error) {
      this.context.stderr.write(`handoff config print failed: ${describeError(error)}\n`);
      return 1;
    }
  }
}
