import type { TrapezoidParams } from "./membership.js";

export type Term = "very_low" | "low" | "medium" | "high" | "very_high";

export const TERMS: readonly Term[] = ["very_low", "low", "medium", "high", "very_high"];

export type TermSet = Record<Term, TrapezoidParams>;

/** Humidity (%) and fan power (%) share one fixed partition. */
export const PERCENT_TERMS: TermSet = {
  very_low: [-100, 0, 20, 30],
  low: [20, 30, 40, 50],
  medium: [40, 50, 60, 70],
  high: [60, 70, 80, 90],
  very_high: [80, 90, 100, 1000],
};

/**
 * Temperature terms scaled to the universe `[min, max]`. The outer terms reach
 * far past both ends so readings outside the universe still saturate.
 */
export function temperatureTerms(min: number, max: number): TermSet {
  const span = max - min;
  const at = (fraction: number) => min + fraction * span;
  const farBelow = max > 10 ? min - max ** 4 : min - (Math.abs(max) + 10) ** 4;
  return {
    very_low: [farBelow, min, at(0.2), at(0.3)],
    low: [at(0.2), at(0.3), at(0.4), at(0.5)],
    medium: [at(0.4), at(0.5), at(0.6), at(0.7)],
    high: [at(0.6), at(0.7), at(0.8), at(0.9)],
    very_high: [at(0.8), at(0.9), max, max * 10],
  };
}
