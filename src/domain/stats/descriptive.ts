/**
 * Descriptive Statistics Domain Logic
 *
 * Small numeric helpers shared by season aggregation, scoring and trend
 * analysis. Every ratio returns null instead of dividing by zero, so callers
 * decide whether a missing value is omitted, nulled or floored.
 *
 * No async I/O, no logging.
 */

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

/**
 * Sum of `select(item)` across `items`.
 */
export function sumBy<T>(items: readonly T[], select: (item: T) => number): number {
  let total = 0;
  for (const item of items) {
    total += select(item);
  }
  return total;
}

/**
 * Arithmetic mean, or null for an empty list.
 */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return sum(values) / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator), or null below two samples.
 */
export function sampleStdDev(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const avg = sum(values) / values.length;
  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * numerator / denominator, or null when the denominator is zero.
 */
export function safeRatio(numerator: number, denominator: number): number | null {
  if (denominator === 0) return null;
  return numerator / denominator;
}

/**
 * Percent change from `previous` to `current`, or null when `previous` is not positive.
 *
 * @example
 * percentChange(12, 10) // 20
 */
export function percentChange(current: number, previous: number): number | null {
  if (previous <= 0) return null;
  return ((current - previous) / previous) * 100;
}

/**
 * Coefficient of variation as a percentage: sample stdev / mean * 100.
 * Null when the mean is not positive or there are fewer than two samples.
 */
export function coefficientOfVariation(values: readonly number[]): number | null {
  const avg = mean(values);
  const std = sampleStdDev(values);
  if (avg === null || std === null || avg <= 0) return null;
  return (std / avg) * 100;
}
