#!/usr/bin/env node
import { Cli, Builtins } from "clipanion";
import { ConfigPrintCommand } from "./commands/config.js";
import { DoctorCommand } from "./commands/doctor.js";
import { RunCommand } from "./commands/run.js";
import { HANDOFF_VERSION } from "./version.js";

const [, , ...args] = process.argv;
const cli = new Cli({ binaryLabel: "handoff", binaryName: "handoff", binaryVersion: HANDOFF_VERSION });

cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);
cli.register(RunCommand);
cli.register(DoctorCommand);
cli.register(ConfigPrintCommand);

void cli.runExit(args, Cli.defaultContext);
