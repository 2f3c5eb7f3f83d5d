/**
 * Splits a command line on whitespace. Single and double quotes group words; a
 * backslash escapes the next character outside single quotes.
 */
export function splitCommandLine(line: string): string[] {
  const parts: string[] = [];
  let current = "";
  let hasToken = false;
  let quote: "'" | "\"" | null = null;

  for (let i = 0; i < line.length; i += 1) {
    const ch = line.charAt(i);
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === "\"" && i + 1 < line.length) {
        i += 1;
        current += line.charAt(i);
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === "'" || ch === "\"") {
      quote = ch;
      hasToken = true;
    } else if (ch === "\\" && i + 1 < line.length) {
      i += 1;
      current += line.charAt(i);
      hasToken = true;
    } else if (/\s/.test(ch)) {
      if (hasToken) {
        parts.push(current);
        current = "";
        hasToken = false;
      }
    } else {
      current += ch;
      hasToken = true;
    }
  }

  if (quote) {
    throw new Error(`Unterminated ${quote} quote in command: ${line}`);
  }
  if (hasToken) {
    parts.push(current);
  }
  return parts;
}
