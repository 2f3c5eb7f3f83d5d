import assert from "node:assert/strict";
import { test } from "node:test";
import { RULES } from "../src/rules.js";
import { VentilationSystem } from "../src/system.js";
import { TERMS } from "../src/terms.js";
import { assertClose } from "./helpers.js";

test("the rule base covers every temperature and humidity pair once", () => {
  assert.equal(RULES.length, 25);
  const pairs = new Set(RULES.map(rule => `${rule.temperature}/${rule.humidity}`));
  assert.equal(pairs.size, 25);
  for (const temperature of TERMS) {
    for (const humidity of TERMS) {
      assert.ok(pairs.has(`${temperature}/${humidity}`), `${temperature}/${humidity}`);
    }
  }
});

test("rule outputs", () => {
  const fanFor = (temperature: string, humidity: string) =>
    RULES.find(rule => rule.temperature === temperature && rule.humidity === humidity)?.fan;
  assert.equal(fanFor("very_low", "high"), "high");
  assert.equal(fanFor("low", "high"), "medium");
  assert.equal(fanFor("medium", "very_low"), "low");
  assert.equal(fanFor("high", "very_low"), "high");
  assert.equal(fanFor("high", "high"), "very_high");
  assert.equal(fanFor("very_high", "very_low"), "very_high");
});

test("defuzzify picks the first fan sample reaching the strength", () => {
  const system = new VentilationSystem();
  assertClose(system.defuzzify("medium", 0.5), 45.09109109109109);
  assertClose(system.defuzzify("very_high", 1), 90.08108108108108);
  assert.equal(system.defuzzify("high", 0), 0);
});

test("evaluate blends the firing rules", () => {
  const system = new VentilationSystem();
  assertClose(system.evaluate(25, 50), 25.035035035035033);
  assertClose(system.evaluate(50, 50), 48.1031031031031);
  assertClose(system.evaluate(40, 75), 50.04504504504504);
  assertClose(system.evaluate(89, 50), 83.2152152152152);
  assert.equal(system.evaluate(10, 0), 0);
});

test("only the matching rules fire", () => {
  const firing = new VentilationSystem()
    .activate(25, 50)
    .filter(activation => activation.strength > 0)
    .map(activation => `${activation.rule.temperature}/${activation.rule.humidity}->${activation.rule.fan}`);
  assert.deepEqual(firing, ["very_low/medium->low", "low/medium->low"]);
});

test("evaluate is 0 when no rule fires", () => {
  assert.equal(new VentilationSystem().evaluate(50, -150), 0);
  assert.equal(new VentilationSystem().evaluate(50, 2000), 0);
});

test("temperature terms follow the configured range", () => {
  const system = new VentilationSystem({ min: -30, max: 30 });
  assertClose(system.evaluate(0, 60), 46.90759612071087);
  assertClose(system.temperatureMembership("very_low", -30), 0.9999999999989172);
  assert.equal(system.temperatureMembership("medium", 3), 1);
  assert.equal(system.overrideThreshold, 24);
});

test("recommend runs the fan flat out near the top of the range", () => {
  const system = new VentilationSystem();
  assert.equal(system.overrideThreshold, 90);

  const hot = system.recommend(95, 10);
  assert.equal(hot.overridden, true);
  assert.equal(hot.fanSpeed, 100);
  assertClose(hot.weighted, 90.08108108108108);

  const warm = system.recommend(89, 50);
  assert.equal(warm.overridden, false);
  assertClose(warm.fanSpeed, 83.2152152152152);
  assert.equal(warm.activations.length, 25);
});

test("a range whose minimum exceeds its maximum is rejected", () => {
  assert.throws(
    () => new VentilationSystem({ min: 10, max: -10 }),
    (error: unknown) =>
      error instanceof RangeError && error.message === "Temperature range minimum 10 exceeds maximum -10"
  );
});
