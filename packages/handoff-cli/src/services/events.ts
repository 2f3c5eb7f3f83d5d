import type { LaunchEvent, StepOutcome } from "@handoff/core";

function describeOutcome(outcome: StepOutcome): string {
  if (outcome.skipped) {
    return "skipped";
  }
  if (outcome.signal) {
    return `terminated by ${outcome.signal}`;
  }
  if (outcome.exitCode === null) {
    return `did not start${outcome.error ? ` (${outcome.error.split("\n")[0]})` : ""}`;
  }
  return `exited with code ${outcome.exitCode}`;
}

function commandLine(command: string, args: string[]): string {
  return [command, ...args].map(part => (/\s/.test(part) || part === "" ? JSON.stringify(part) : part)).join(" ");
}

export function formatLaunchEvent(event: LaunchEvent): string {
  switch (event.type) {
    case "resolve":
      return `base directory ${event.paths.baseDir}`;
    case "clear":
      return `clear (${event.phase})`;
    case "install:start":
      return `installing: ${commandLine(event.command, event.args)}`;
    case "install:exit":
      return `installer ${describeOutcome(event.outcome)}`;
    case "install:skip":
      return `install skipped: ${event.reason}`;
    case "entry:start":
      return `running: ${commandLine(event.command, event.args)}`;
    case "entry:exit":
      return `entry point ${describeOutcome(event.outcome)}`;
    case "pause":
      return "waiting for Enter";
    case "exit":
      return `exit ${event.code}`;
  }
}
