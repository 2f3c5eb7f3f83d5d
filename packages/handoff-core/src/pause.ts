import { input as inquirerInput } from "@inquirer/prompts";
import { LauncherError } from "./errors.js";
import { watchInputEnd } from "./input-end.js";
import type { LaunchStreams } from "./types.js";

export type PausePrompt = (message: string, streams: LaunchStreams) => Promise<void>;

const inquirerPause: PausePrompt = async (message, streams) => {
  const inputEnd = watchInputEnd(streams.stdin);
  // End of input counts as the line arriving.
  if (inputEnd.signal.aborted) {
    return;
  }
  try {
    await inquirerInput({ message }, { input: streams.stdin, output: streams.stdout, signal: inputEnd.signal });
  } catch (error) {
    if (inputEnd.signal.aborted) {
      return;
    }
    if (error instanceof Error && error.name === "ExitPromptError") {
      throw new LauncherError("INTERRUPTED", "Interrupted while waiting for Enter", { cause: error });
    }
    throw error;
  } finally {
    inputEnd.dispose();
  }
};

let pausePrompt: PausePrompt = inquirerPause;

export function __setPausePrompt(fn: PausePrompt) {
  pausePrompt = fn;
}

export function __resetPausePrompt() {
  pausePrompt = inquirerPause;
}

export async function waitForEnter(message: string, streams: LaunchStreams): Promise<void> {
  await pausePrompt(message, streams);
}
