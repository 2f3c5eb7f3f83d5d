import assert from "node:assert/strict";
import { test } from "node:test";
import { splitCommandLine } from "../src/command-line.js";

test("splits on runs of whitespace", () => {
  assert.deepEqual(splitCommandLine("  pip   install\t-r  reqs.txt "), ["pip", "install", "-r", "reqs.txt"]);
});

test("keeps quoted words together", () => {
  assert.deepEqual(splitCommandLine(`uv pip install -r "my reqs.txt" --index 'a b'`), [
    "uv",
    "pip",
    "install",
    "-r",
    "my reqs.txt",
    "--index",
    "a b",
  ]);
});

test("keeps empty quoted arguments", () => {
  assert.deepEqual(splitCommandLine(`run "" x`), ["run", "", "x"]);
});

test("honours backslash escapes outside single quotes", () => {
  assert.deepEqual(splitCommandLine(`python\\ 3 "say \\"hi\\"" 'a\\b'`), ["python 3", `say "hi"`, "a\\b"]);
});

test("rejects an unterminated quote", () => {
  assert.throws(() => splitCommandLine(`pip "install`), /Unterminated " quote/);
});

test("returns nothing for a blank line", () => {
  assert.deepEqual(splitCommandLine("   "), []);
});
