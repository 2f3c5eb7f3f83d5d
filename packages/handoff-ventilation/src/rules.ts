import { TERMS, type Term } from "./terms.js";

export interface Rule {
  temperature: Term;
  humidity: Term;
  fan: Term;
}

/** Fan term for each humidity term at one temperature term. */
type RuleRow = Record<Term, Term>;

function expand(temperature: Term, fans: RuleRow): Rule[] {
  return TERMS.map(humidity => ({ temperature, humidity, fan: fans[humidity] }));
}

/**
 * One rule per temperature × humidity pair. Cold air leans on humidity, hot
 * air drives the fan up whatever the humidity.
 */
export const RULES: readonly Rule[] = [
  ...expand("very_low", { very_low: "very_low", low: "very_low", medium: "low", high: "high", very_high: "high" }),
  ...expand("low", { very_low: "very_low", low: "low", medium: "low", high: "medium", very_high: "high" }),
  ...expand("medium", { very_low: "low", low: "low", medium: "medium", high: "high", very_high: "high" }),
  ...expand("high", { very_low: "high", low: "high", medium: "high", high: "very_high", very_high: "very_high" }),
  ...expand("very_high", {
    very_low: "very_high",
    low: "very_high",
    medium: "very_high",
    high: "very_high",
    very_high: "very_high",
  }),
];
