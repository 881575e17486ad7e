import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Plain-object form of a {@link LapwatchError}, as produced by `toJSON()`.
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  cause?: { name: string; message: string } | undefined;
}

/**
 * Abstract root of every error thrown by lapwatch packages.
 *
 * Subclasses pin `_tag`, `code`, `domain` and `isExpected`, normally from
 * the catalog entry of their code.
 */
export abstract class LapwatchError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;

  constructor(message: string, metadata?: Record<string, string>, options?: { cause?: Error }) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
  }

  toJSON(): ErrorJSON {
    const cause = this.cause instanceof Error ? this.cause : undefined;
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(cause ? { cause: { name: cause.name, message: cause.message } } : {}),
    };
  }
}

/** Check if a value is a LapwatchError instance */
export function isLapwatchError(value: unknown): value is LapwatchError {
  return value instanceof LapwatchError;
}
