/**
 * Primitive mathematical functions
 *
 * Pure functions with no dependencies.
 */

/**
 * Clamp value to range
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * a - b, floored at zero (counts never go negative)
 */
export function saturatingSubtract(a: number, b: number): number {
  return a > b ? a - b : 0;
}

/**
 * Sum of a numeric array
 */
export function sum(values: ArrayLike<number>): number {
  let total = 0;
  for (let i = 0; i < values.length; i++) {
    total += values[i];
  }
  return total;
}

/**
 * Arithmetic mean. NaN for an empty array.
 */
export function mean(values: readonly number[]): number {
  return sum(values) / values.length;
}

/**
 * Population standard deviation
 */
export function standardDeviation(values: readonly number[]): number {
  const m = mean(values);
  let squares = 0;
  for (const v of values) {
    squares += (v - m) * (v - m);
  }
  return Math.sqrt(squares / values.length);
}
