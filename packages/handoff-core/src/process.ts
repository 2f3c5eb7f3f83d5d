import { execa } from "execa";
import type { ProcessRunner, ProcessRunOptions, StepOutcome } from "./types.js";

function readMessage(result: object): string | undefined {
  if ("shortMessage" in result && typeof result.shortMessage === "string" && result.shortMessage) {
    return result.shortMessage;
  }
  if ("message" in result && typeof result.message === "string" && result.message) {
    return result.message;
  }
  return undefined;
}

/**
 * Runs a child process to completion and reports how it ended. Never throws on a
 * non-zero exit, a signal or a failed spawn: those end up in the outcome.
 */
export const execaRunner: ProcessRunner = {
  async run(command: string, args: string[], options: ProcessRunOptions): Promise<StepOutcome> {
    const result = await execa(command, args, {
      cwd: options.cwd,
      stdin: "inherit",
      stdout: options.output === "quiet" ? "ignore" : "inherit",
      stderr: "inherit",
      reject: false,
    });
    const exitCode = typeof result.exitCode === "number" ? result.exitCode : null;
    const outcome: StepOutcome = {
      command,
      args,
      exitCode,
      signal: result.signal ?? null,
      failed: result.failed,
      skipped: false,
    };
    if (result.failed) {
      const message = readMessage(result);
      if (message) {
        outcome.error = message;
      }
    }
    return outcome;
  },
};

export function skippedOutcome(command: string, args: string[]): StepOutcome {
  return { command, args, exitCode: null, signal: null, failed: false, skipped: true };
}
