import type { Readable, Writable } from "node:stream";

export type LaunchLocale = "en" | "ru";

export interface LaunchPaths {
  baseDir: string;
  manifestPath: string;
  entryPointPath: string;
}

export interface StepOutcome {
  command: string;
  args: string[];
  exitCode: number | null;
  signal: string | null;
  failed: boolean;
  skipped: boolean;
  error?: string;
}

export interface LaunchReport {
  paths: LaunchPaths;
  install: StepOutcome;
  entry: StepOutcome;
  exitCode: 0;
}

export type ClearPhase = "start" | "handoff" | "exit";

export type LaunchEvent =
  | { type: "resolve"; paths: LaunchPaths }
  | { type: "clear"; phase: ClearPhase }
  | { type: "install:start"; command: string; args: string[] }
  | { type: "install:exit"; outcome: StepOutcome }
  | { type: "install:skip"; reason: string }
  | { type: "entry:start"; command: string; args: string[] }
  | { type: "entry:exit"; outcome: StepOutcome }
  | { type: "pause"; message: string }
  | { type: "exit"; code: 0 };

export type LaunchListener = (event: LaunchEvent) => void;

export type ProcessOutput = "inherit" | "quiet";

export interface ProcessRunOptions {
  cwd: string;
  output: ProcessOutput;
}

export interface ProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions): Promise<StepOutcome>;
}

export interface LaunchStreams {
  stdin: Readable;
  stdout: Writable;
}
