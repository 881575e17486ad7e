/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the lapwatch packages is declared here.
 * Each code maps to a base error type, a domain, and whether the condition
 * is an expected (caller-caused) one.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError";

/**
 * Domains an error code can belong to.
 */
export type ErrorDomain = "stopwatch";

/**
 * Shape of a single catalog entry.
 */
export interface ErrorCatalogEntry {
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

export const ERROR_CATALOG = {
  // ============================================================================
  // STOPWATCH ERRORS - Timing state machine
  // ============================================================================
  STOPWATCH_CONFIGURATION_INVALID: {
    domain: "stopwatch",
    baseType: "ValidationError",
    isExpected: true,
    title: "Stopwatch configuration invalid",
    description: "The stopwatch options or the selected time source are not supported",
  },
  STOPWATCH_INVALID_ARGUMENT: {
    domain: "stopwatch",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid stopwatch argument",
    description: "An operation received an argument outside its accepted range",
  },
  STOPWATCH_INVALID_FORMAT: {
    domain: "stopwatch",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid report format",
    description: "A report format template is malformed or has too few values",
  },
  STOPWATCH_INSUFFICIENT_DATA: {
    domain: "stopwatch",
    baseType: "ValidationError",
    isExpected: true,
    title: "Insufficient lap data",
    description: "The requested lap statistic needs more recorded laps",
  },
  STOPWATCH_SYNC_TARGET_INVALID: {
    domain: "stopwatch",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid sync target",
    description: "Only Stopwatch instances can be synchronized",
  },
} as const satisfies Record<string, ErrorCatalogEntry>;

/**
 * Every error code in the catalog.
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;
