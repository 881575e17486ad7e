/**
 * Descriptive statistics over lap durations.
 *
 * Every function returns 0 for an empty input, except `sampleStdev`,
 * which needs at least two values once any are present.
 */

import { StopwatchInsufficientDataError } from "@lapwatch/errors";

export function minimum(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((min, value) => (value < min ? value : min));
}

export function maximum(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((max, value) => (value > max ? value : max));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Middle value, or the mean of the two middle values for an even count */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[middle - 1] ?? 0) + upper) / 2;
}

/**
 * Sample standard deviation (divisor N - 1).
 *
 * @throws {StopwatchInsufficientDataError} for exactly one value
 */
export function sampleStdev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  if (values.length < 2) {
    throw new StopwatchInsufficientDataError("sample standard deviation", 2, values.length);
  }
  const avg = mean(values);
  const squares = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}
