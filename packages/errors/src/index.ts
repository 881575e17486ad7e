/**
 * @lapwatch/errors
 *
 * Shared error taxonomy for the lapwatch packages.
 *
 * Every error extends LapwatchError and carries a `.code` from the catalog
 * that discriminates the specific condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof` / the guards for family matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isLapwatchError, LapwatchError } from "./base.js";

export {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getErrorMessage } from "./utils.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { hasCode, isExpectedError, isStopwatchError } from "./guards.js";

// ============================================================================
// STOPWATCH ERRORS
// ============================================================================

export {
  StopwatchConfigurationError,
  StopwatchError,
  StopwatchInsufficientDataError,
  StopwatchInvalidArgumentError,
  StopwatchInvalidFormatError,
  StopwatchSyncTargetError,
} from "./stopwatch.js";
