import type { Readable } from "node:stream";

export interface InputEndWatch {
  /** Aborted once the stream has ended or closed. */
  signal: AbortSignal;
  dispose(): void;
}

/** Pass `signal` to an inquirer prompt so it settles when its input runs out. */
export function watchInputEnd(stdin: Readable): InputEndWatch {
  const controller = new AbortController();
  const onEnd = () => controller.abort();
  if (stdin.readableEnded || stdin.destroyed) {
    controller.abort();
  } else {
    stdin.once("end", onEnd);
    stdin.once("close", onEnd);
  }
  return {
    signal: controller.signal,
    dispose() {
      stdin.off("end", onEnd);
      stdin.off("close", onEnd);
    },
  };
}
