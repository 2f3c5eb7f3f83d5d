import assert from "node:assert/strict";
import { test } from "node:test";
import { linspace, trapmf, trimf } from "../src/membership.js";
import { PERCENT_TERMS, temperatureTerms } from "../src/terms.js";
import { assertClose } from "./helpers.js";

test("trapmf rises, plateaus and falls", () => {
  const params = [20, 30, 40, 50] as const;
  assert.equal(trapmf(10, params), 0);
  assertClose(trapmf(25, params), 0.499999950000005);
  assert.equal(trapmf(35, params), 1);
  assertClose(trapmf(45, params), 0.499999950000005);
  assert.equal(trapmf(60, params), 0);
});

test("trimf peaks at its middle point", () => {
  const params = [0, 10, 20] as const;
  assertClose(trimf(5, params), 0.499999950000005);
  assertClose(trimf(10, params), 0.99999990000001);
  assertClose(trimf(15, params), 0.499999950000005);
  assert.equal(trimf(25, params), 0);
});

test("linspace includes both ends", () => {
  const samples = linspace(0, 101, 1000);
  assert.equal(samples.length, 1000);
  assert.equal(samples[0], 0);
  assertClose(samples[1] ?? Number.NaN, 0.1011011011011011);
  assert.equal(samples[999], 101);
  assert.deepEqual(linspace(3, 7, 1), [3]);
  assert.deepEqual(linspace(3, 7, 0), []);
});

test("temperature terms scale with the universe", () => {
  const terms = temperatureTerms(-30, 31);
  assert.equal(terms.very_low[0], -923551);
  assert.equal(terms.very_low[1], -30);
  assertClose(terms.very_low[2], -17.8);
  assertClose(terms.low[3], 0.5);
  assertClose(terms.very_high[1], 24.9);
  assert.deepEqual(terms.very_high.slice(2), [31, 310]);
});

test("a small universe pushes very_low far below its minimum", () => {
  assert.equal(temperatureTerms(0, 6).very_low[0], -65536);
});

test("humidity and fan share one fixed partition", () => {
  assert.deepEqual(PERCENT_TERMS.medium, [40, 50, 60, 70]);
  assert.deepEqual(PERCENT_TERMS.very_high, [80, 90, 100, 1000]);
});
