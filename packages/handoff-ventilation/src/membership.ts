/** Corner points `[a, b, c, d]` of a trapezoid: rises over a..b, flat over b..c, falls over c..d. */
export type TrapezoidParams = readonly [number, number, number, number];

/** Corner points `[a, b, c]` of a triangle peaking at `b`. */
export type TriangleParams = readonly [number, number, number];

// Keeps degenerate edges (a === b, c === d) from dividing by zero.
const EDGE_EPSILON = 1e-6;

export function trapmf(x: number, [a, b, c, d]: TrapezoidParams): number {
  return Math.max(0, Math.min(Math.min((x - a) / (b - a + EDGE_EPSILON), 1), (d - x) / (d - c + EDGE_EPSILON)));
}

export function trimf(x: number, [a, b, c]: TriangleParams): number {
  return Math.max(0, Math.min((x - a) / (b - a + EDGE_EPSILON), (c - x) / (c - b + EDGE_EPSILON)));
}

/** `count` evenly spaced samples from `start` to `stop`, both included. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count < 2) {
    return count === 1 ? [start] : [];
  }
  const step = (stop - start) / (count - 1);
  const values = Array.from({ length: count }, (_, i) => i * step + start);
  values[count - 1] = stop;
  return values;
}
