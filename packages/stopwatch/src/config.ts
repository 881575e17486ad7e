/**
 * Configuration validation and resolution.
 */

import { StopwatchConfigurationError, StopwatchInvalidArgumentError } from "@lapwatch/errors";
import { type ZodError, z } from "zod";
import { TIME_SOURCES } from "./clock.js";
import {
  CUTOFF_POLICIES,
  DEFAULT_CUTOFF_POLICY,
  DEFAULT_TIME_SOURCE,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
  TIME_SOURCE_NAMES,
} from "./constants.js";
import type {
  Clock,
  LoopTimerOptions,
  Printer,
  ReportProcessor,
  ResolvedLoopTimerOptions,
  ResolvedStopwatchConfig,
  ResolvedTimedLoopOptions,
  StopwatchConfig,
  TimedLoopOptions,
} from "./types.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

function isFunction(value: unknown): boolean {
  return typeof value === "function";
}

function isClock(value: unknown): boolean {
  return typeof value === "object" && value !== null && "now" in value && isFunction(value.now);
}

function isIterable(value: unknown): boolean {
  if (typeof value === "string") return true;
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    isFunction(value[Symbol.iterator])
  );
}

const durationSchema = z.number().finite().nonnegative();
const chunkSizeSchema = z.number().int().positive({ message: "chunkSize must be a positive integer" });

/**
 * Zod schema for stopwatch construction options.
 * Functions are checked structurally so they pass through unwrapped.
 */
export const StopwatchConfigSchema = z
  .object({
    startActive: z.boolean().optional(),
    numeric: z.boolean().optional(),
    hms: z.boolean().optional(),
    format: z.string().min(1, "format must not be empty").optional(),
    process: z.custom<ReportProcessor>(isFunction, "process must be a function").optional(),
    timeSource: z.enum(TIME_SOURCE_NAMES).optional(),
    clock: z.custom<Clock>(isClock, "clock must provide a now() function").optional(),
    output: z.custom<Printer>(isFunction, "output must be a function").optional(),
  })
  .strict();

export const LoopTimerOptionsSchema = z
  .object({
    chunkSize: chunkSizeSchema.optional(),
    report: z.boolean().optional(),
  })
  .strict();

export const TimedLoopOptionsSchema = LoopTimerOptionsSchema.extend({
  iterable: z.custom<Iterable<unknown>>(isIterable, "iterable must be iterable").optional(),
  seconds: durationSchema.optional(),
  minutes: durationSchema.optional(),
  hours: durationSchema.optional(),
  cutoff: z.enum(CUTOFF_POLICIES).optional(),
}).strict();

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function firstIssuePath(error: ZodError): string {
  const path = error.issues[0]?.path ?? [];
  return path.length > 0 ? path.join(".") : "options";
}

/**
 * Validates and resolves a {@link StopwatchConfig} into a fully-resolved
 * config with all defaults applied.
 *
 * @throws {StopwatchConfigurationError} on invalid input, including an unsupported time source
 */
export function resolveStopwatchConfig(config: StopwatchConfig = {}): ResolvedStopwatchConfig {
  const result = StopwatchConfigSchema.safeParse(config);
  if (!result.success) {
    throw new StopwatchConfigurationError(describeIssues(result.error), result.error);
  }

  const timeSource = config.timeSource ?? DEFAULT_TIME_SOURCE;
  return {
    startActive: config.startActive ?? true,
    numeric: config.numeric ?? false,
    hms: config.hms ?? true,
    format: config.format,
    process: config.process,
    timeSource,
    clock: config.clock ?? TIME_SOURCES[timeSource],
    output: config.output ?? ((line: string) => console.log(line)),
  };
}

/**
 * @throws {StopwatchInvalidArgumentError} when chunkSize is not a positive integer
 */
export function resolveLoopTimerOptions(options: LoopTimerOptions = {}): ResolvedLoopTimerOptions {
  const result = LoopTimerOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new StopwatchInvalidArgumentError(firstIssuePath(result.error), describeIssues(result.error));
  }
  return {
    chunkSize: options.chunkSize ?? 1,
    report: options.report ?? false,
  };
}

/**
 * Resolves timed loop options, folding seconds/minutes/hours into one threshold.
 *
 * @throws {StopwatchInvalidArgumentError} on an unknown cutoff policy or malformed budget
 */
export function resolveTimedLoopOptions<T>(options: TimedLoopOptions<T> = {}): ResolvedTimedLoopOptions {
  const result = TimedLoopOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new StopwatchInvalidArgumentError(firstIssuePath(result.error), describeIssues(result.error));
  }
  return {
    chunkSize: options.chunkSize ?? 1,
    report: options.report ?? false,
    threshold:
      (options.seconds ?? 0) +
      SECONDS_PER_MINUTE * (options.minutes ?? 0) +
      SECONDS_PER_HOUR * (options.hours ?? 0),
    cutoff: options.cutoff ?? DEFAULT_CUTOFF_POLICY,
  };
}
