#!/usr/bin/env node
import { Cli, Builtins } from "clipanion";
import { RecommendCommand } from "./commands/recommend.js";
import { VENTILATION_VERSION } from "./version.js";

const [, , ...args] = process.argv;
const cli = new Cli({ binaryLabel: "ventilation", binaryName: "ventilation", binaryVersion: VENTILATION_VERSION });

cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);
cli.register(RecommendCommand);

void cli.runExit(args, Cli.defaultContext);
