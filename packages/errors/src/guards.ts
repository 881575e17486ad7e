/**
 * Type guards for stopwatch errors + code-level discrimination.
 */

import { LapwatchError } from "./base.js";
import type { ErrorCode } from "./catalog.js";
import { StopwatchError } from "./stopwatch.js";

/** Check if an error was raised by a stopwatch operation */
export function isStopwatchError(error: unknown): error is StopwatchError {
  return error instanceof StopwatchError;
}

/**
 * Check if a LapwatchError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: LapwatchError,
  code: C,
): error is LapwatchError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected (caller-caused) condition.
 * Returns false for non-LapwatchError values.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof LapwatchError && error.isExpected;
}
