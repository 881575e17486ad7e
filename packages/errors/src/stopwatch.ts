/**
 * Stopwatch errors: timing state machine, reporting and loop timers
 *
 * Abstract base: StopwatchError
 * Concrete:
 *   - StopwatchConfigurationError (STOPWATCH_CONFIGURATION_INVALID)
 *   - StopwatchInvalidArgumentError (STOPWATCH_INVALID_ARGUMENT)
 *   - StopwatchInvalidFormatError (STOPWATCH_INVALID_FORMAT)
 *   - StopwatchInsufficientDataError (STOPWATCH_INSUFFICIENT_DATA)
 *   - StopwatchSyncTargetError (STOPWATCH_SYNC_TARGET_INVALID)
 */

import { LapwatchError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

/**
 * Abstract base class for stopwatch errors.
 *
 * Enables generic catch: `if (e instanceof StopwatchError)`
 * while specific subclasses allow precise handling.
 */
export abstract class StopwatchError extends LapwatchError {}

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

/**
 * Thrown when stopwatch options fail validation, including an unsupported
 * time source.
 */
export class StopwatchConfigurationError extends StopwatchError {
  readonly _tag = "ValidationError" as const;
  readonly code = "STOPWATCH_CONFIGURATION_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string, cause?: Error) {
    super(`Invalid stopwatch configuration: ${message}`, undefined, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.STOPWATCH_CONFIGURATION_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

// ---------------------------------------------------------------------------
// Invalid argument
// ---------------------------------------------------------------------------

export class StopwatchInvalidArgumentError extends StopwatchError {
  readonly _tag = "ValidationError" as const;
  readonly code = "STOPWATCH_INVALID_ARGUMENT" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(`Invalid argument "${argument}": ${message}`, { argument });
    const entry = ERROR_CATALOG.STOPWATCH_INVALID_ARGUMENT;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.argument = argument;
  }
}

// ---------------------------------------------------------------------------
// Invalid format: report template cannot be rendered
// ---------------------------------------------------------------------------

export class StopwatchInvalidFormatError extends StopwatchError {
  readonly _tag = "ValidationError" as const;
  readonly code = "STOPWATCH_INVALID_FORMAT" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly template: string;

  constructor(template: string, message: string) {
    super(`Invalid format template "${template}": ${message}`, { template });
    const entry = ERROR_CATALOG.STOPWATCH_INVALID_FORMAT;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.template = template;
  }
}

// ---------------------------------------------------------------------------
// Insufficient data: statistic undefined for the recorded laps
// ---------------------------------------------------------------------------

export class StopwatchInsufficientDataError extends StopwatchError {
  readonly _tag = "ValidationError" as const;
  readonly code = "STOPWATCH_INSUFFICIENT_DATA" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly required: number;
  readonly available: number;

  constructor(statistic: string, required: number, available: number) {
    super(`${statistic} requires at least ${required} laps, got ${available}`, {
      statistic,
    });
    const entry = ERROR_CATALOG.STOPWATCH_INSUFFICIENT_DATA;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.required = required;
    this.available = available;
  }
}

// ---------------------------------------------------------------------------
// Sync target invalid
// ---------------------------------------------------------------------------

/**
 * Thrown by `Stopwatch.sync` when a target is not a Stopwatch.
 */
export class StopwatchSyncTargetError extends StopwatchError {
  readonly _tag = "ValidationError" as const;
  readonly code = "STOPWATCH_SYNC_TARGET_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly position: number;

  constructor(position: number, received: string) {
    super(`sync target at position ${position} is not a Stopwatch (got ${received})`);
    const entry = ERROR_CATALOG.STOPWATCH_SYNC_TARGET_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.position = position;
  }
}
