export type { TrapezoidParams, TriangleParams } from "./membership.js";
export type { Term, TermSet } from "./terms.js";
export type { Rule } from "./rules.js";
export type { Recommendation, RuleActivation, ValueRange } from "./system.js";
export type { VentilationMessages } from "./messages.js";
export type { SessionOptions, SessionResult, ValuePrompt } from "./session.js";

export { linspace, trapmf, trimf } from "./membership.js";
export { PERCENT_TERMS, TERMS, temperatureTerms } from "./terms.js";
export { RULES } from "./rules.js";
export {
  DEFAULT_TEMPERATURE_RANGE,
  HUMIDITY_RANGE,
  MAX_FAN_SPEED,
  VentilationSystem,
} from "./system.js";
export { parseHumidity, parseInRange, parseInteger, parseTemperatureRange } from "./input.js";
export { ventilationMessages } from "./messages.js";
export {
  InputEndedError,
  __resetValuePrompt,
  __setValuePrompt,
  runVentilationSession,
} from "./session.js";
export { RecommendCommand } from "./commands/recommend.js";
export { VENTILATION_VERSION } from "./version.js";
