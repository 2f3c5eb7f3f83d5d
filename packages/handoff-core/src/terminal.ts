import type { Writable } from "node:stream";

// Cursor home, erase display, erase scrollback: what `clear` writes on xterm-like terminals.
export const CLEAR_SEQUENCE = "\u001b[H\u001b[2J\u001b[3J";

export function clearTerminal(stream: Writable): void {
  stream.write(CLEAR_SEQUENCE);
}
