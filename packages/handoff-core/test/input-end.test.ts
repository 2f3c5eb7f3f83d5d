import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import { test } from "node:test";
import { watchInputEnd } from "../src/input-end.js";

test("aborts once the stream ends", async () => {
  const stdin = new PassThrough();
  const watch = watchInputEnd(stdin);
  assert.equal(watch.signal.aborted, false);

  stdin.resume();
  stdin.end();
  await new Promise(resolve => stdin.once("end", resolve));

  assert.equal(watch.signal.aborted, true);
  watch.dispose();
});

test("starts aborted for a stream that already ended", async () => {
  const stdin = new PassThrough();
  stdin.resume();
  stdin.end();
  await new Promise(resolve => stdin.once("end", resolve));

  assert.equal(watchInputEnd(stdin).signal.aborted, true);
});

test("dispose removes its listeners", () => {
  const stdin = new PassThrough();
  const endBefore = stdin.listenerCount("end");
  const closeBefore = stdin.listenerCount("close");
  const watch = watchInputEnd(stdin);
  assert.equal(stdin.listenerCount("end"), endBefore + 1);
  assert.equal(stdin.listenerCount("close"), closeBefore + 1);

  watch.dispose();
  assert.equal(stdin.listenerCount("end"), endBefore);
  assert.equal(stdin.listenerCount("close"), closeBefore);
});
