import { linspace, trapmf } from "./membership.js";
import { RULES, type Rule } from "./rules.js";
import { PERCENT_TERMS, temperatureTerms, type Term, type TermSet } from "./terms.js";

/** Inclusive integer bounds, as a user enters them. */
export interface ValueRange {
  min: number;
  max: number;
}

export const DEFAULT_TEMPERATURE_RANGE: ValueRange = { min: 0, max: 100 };
export const HUMIDITY_RANGE: ValueRange = { min: 0, max: 100 };

const FAN_UNIVERSE = { start: 0, stop: 101 };
const FAN_SAMPLES = 1000;
// A fan sample matches a rule strength when its membership is within this of it.
const MATCH_TOLERANCE = 1e-3;
// Share of the temperature universe above which the fan runs flat out.
const OVERRIDE_FRACTION = 0.9;
export const MAX_FAN_SPEED = 100;

export interface RuleActivation {
  rule: Rule;
  /** min(temperature membership, humidity membership) */
  strength: number;
  fanSpeed: number;
}

export interface Recommendation {
  temperature: number;
  humidity: number;
  /** Weighted average of the rule outputs, 0 when no rule fires. */
  weighted: number;
  /** `weighted`, or the maximum once the temperature crosses `overrideThreshold`. */
  fanSpeed: number;
  overridden: boolean;
  activations: RuleActivation[];
}

/**
 * Tsukamoto controller mapping temperature and relative humidity to a fan
 * power in percent. Each rule's output term is inverted on its rising edge,
 * and the crisp result is the strength-weighted average of those points.
 */
export class VentilationSystem {
  readonly temperatureRange: ValueRange;
  readonly temperatureTerms: TermSet;
  readonly humidityTerms: TermSet = PERCENT_TERMS;
  readonly fanTerms: TermSet = PERCENT_TERMS;
  private readonly fanSamples: number[];

  constructor(temperatureRange: ValueRange = DEFAULT_TEMPERATURE_RANGE) {
    if (temperatureRange.min > temperatureRange.max) {
      throw new RangeError(
        `Temperature range minimum ${temperatureRange.min} exceeds maximum ${temperatureRange.max}`
      );
    }
    this.temperatureRange = { ...temperatureRange };
    // The universe runs one degree past the entered maximum.
    this.temperatureTerms = temperatureTerms(temperatureRange.min, temperatureRange.max + 1);
    this.fanSamples = linspace(FAN_UNIVERSE.start, FAN_UNIVERSE.stop, FAN_SAMPLES);
  }

  temperatureMembership(term: Term, temperature: number): number {
    return trapmf(temperature, this.temperatureTerms[term]);
  }

  humidityMembership(term: Term, humidity: number): number {
    return trapmf(humidity, this.humidityTerms[term]);
  }

  /** Lowest sampled fan power whose membership in `term` reaches `strength`. */
  defuzzify(term: Term, strength: number): number {
    const params = this.fanTerms[term];
    const match = this.fanSamples.find(z => trapmf(z, params) >= strength - MATCH_TOLERANCE);
    if (match !== undefined) {
      return match;
    }
    return this.fanSamples.reduce((sum, z) => sum + z, 0) / this.fanSamples.length;
  }

  activate(temperature: number, humidity: number): RuleActivation[] {
    return RULES.map(rule => {
      const strength = Math.min(
        this.temperatureMembership(rule.temperature, temperature),
        this.humidityMembership(rule.humidity, humidity)
      );
      return { rule, strength, fanSpeed: this.defuzzify(rule.fan, strength) };
    });
  }

  evaluate(temperature: number, humidity: number): number {
    return weightedAverage(this.activate(temperature, humidity));
  }

  get overrideThreshold(): number {
    const { min, max } = this.temperatureRange;
    return Math.trunc(min + OVERRIDE_FRACTION * (max + 1 - min));
  }

  recommend(temperature: number, humidity: number): Recommendation {
    const activations = this.activate(temperature, humidity);
    const weighted = weightedAverage(activations);
    const overridden = temperature >= this.overrideThreshold;
    return {
      temperature,
      humidity,
      weighted,
      fanSpeed: overridden ? MAX_FAN_SPEED : weighted,
      overridden,
      activations,
    };
  }
}

function weightedAverage(activations: RuleActivation[]): number {
  let numerator = 0;
  let denominator = 0;
  for (const { strength, fanSpeed } of activations) {
    numerator += strength * fanSpeed;
    denominator += strength;
  }
  return denominator !== 0 ? numerator / denominator : 0;
}
