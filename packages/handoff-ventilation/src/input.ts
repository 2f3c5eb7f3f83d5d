import { HUMIDITY_RANGE, type ValueRange } from "./system.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

/** Two whitespace-separated integers, minimum first. */
export function parseTemperatureRange(raw: string): ValueRange | null {
  const parts = raw.trim().split(/\s+/);
  if (parts.length !== 2) {
    return null;
  }
  const min = parseInteger(parts[0] ?? "");
  const max = parseInteger(parts[1] ?? "");
  if (min === null || max === null || min > max) {
    return null;
  }
  return { min, max };
}

export function parseInRange(raw: string, range: ValueRange): number | null {
  const value = parseInteger(raw);
  if (value === null || value < range.min || value > range.max) {
    return null;
  }
  return value;
}

export function parseHumidity(raw: string): number | null {
  return parseInRange(raw, HUMIDITY_RANGE);
}
