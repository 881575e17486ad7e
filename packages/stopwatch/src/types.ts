/**
 * Type definitions for @lapwatch/stopwatch.
 */

import type { CUTOFF_POLICIES, TIME_SOURCE_NAMES } from "./constants.js";

// ---------------------------------------------------------------------------
// Time sources
// ---------------------------------------------------------------------------

/** Named platform clocks a stopwatch can read from */
export type TimeSourceName = (typeof TIME_SOURCE_NAMES)[number];

/**
 * Clock abstraction for testable timing.
 * `now()` returns a reading in seconds; successive readings must not decrease.
 */
export interface Clock {
  now(): number;
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

/** Hours, minutes and seconds of a duration */
export type Hms = readonly [hours: number, minutes: number, seconds: number];

/** A reported duration: formatted text, raw seconds, or an h/m/s triple */
export type Report = string | number | Hms;

/** A lap report paired with the total elapsed report at the split */
export type LapReport = readonly [lap: Report, total: Report];

/** Transforms raw seconds into a report; supersedes every other report option */
export type ReportProcessor = (seconds: number) => Report;

/** Line sink for printed reports */
export type Printer = (line: string) => void;

/** Per-call overrides of the stopwatch's report defaults */
export interface ReportOptions {
  readonly numeric?: boolean;
  readonly hms?: boolean;
  readonly format?: string;
  readonly process?: ReportProcessor;
}

/** Report options with every default applied */
export interface ResolvedReportOptions {
  readonly numeric: boolean;
  readonly hms: boolean;
  readonly format: string;
  readonly process: ReportProcessor | undefined;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface StopwatchConfig extends ReportOptions {
  /** Start running on construction (default: true) */
  readonly startActive?: boolean;
  /** Platform clock to read (default: "perf-counter") */
  readonly timeSource?: TimeSourceName;
  /** Injected clock; takes precedence over `timeSource` */
  readonly clock?: Clock;
  /** Sink for printed reports (default: console.log) */
  readonly output?: Printer;
}

/** Fully resolved config (no optionals except the explicit format/process) */
export interface ResolvedStopwatchConfig {
  readonly startActive: boolean;
  readonly numeric: boolean;
  readonly hms: boolean;
  /** Caller-supplied format; when absent the default follows the effective `hms` */
  readonly format: string | undefined;
  readonly process: ReportProcessor | undefined;
  readonly timeSource: TimeSourceName;
  readonly clock: Clock;
  readonly output: Printer;
}

// ---------------------------------------------------------------------------
// Operation options
// ---------------------------------------------------------------------------

export interface CheckOptions extends ReportOptions {
  /** Start the watch first if it is paused */
  readonly autoStart?: boolean;
  /** Pause the watch first if it is active (applied before autoStart) */
  readonly autoPause?: boolean;
  /** Also write the report through the output sink */
  readonly print?: boolean;
}

export interface LapOptions extends CheckOptions {
  /** Commit the lap to the lap log (default: true) */
  readonly log?: boolean;
  /** Return `[lap, total]` instead of the lap report alone */
  readonly withTotal?: boolean;
  /** Printed line template; `{l}` is the lap, `{c}` the total */
  readonly template?: string;
}

export interface LapAfterOptions extends LapOptions {
  /** Extra named values for the printed template (`{h}`, `{l}`, `{c}` are reserved) */
  readonly templateValues?: Readonly<Record<string, unknown>>;
}

export interface ResetOptions {
  readonly startActive?: boolean;
  /** Start reference to adopt instead of the current reading */
  readonly start?: number;
  /** Accumulated pause offset to adopt */
  readonly pauseOffset?: number;
  /** Pause reference to adopt when starting paused (default: the start reference) */
  readonly pausedAt?: number;
}

export interface FunctionTimerOptions {
  /** Print each call's operation time */
  readonly report?: boolean;
}

export interface LoopTimerOptions {
  /** Items per timed chunk (default: 1) */
  readonly chunkSize?: number;
  /** Print begin/end lines and per-chunk split times */
  readonly report?: boolean;
}

export interface ResolvedLoopTimerOptions {
  readonly chunkSize: number;
  readonly report: boolean;
}

/** How a timed loop decides to stop at its time budget */
export type CutoffPolicy = (typeof CUTOFF_POLICIES)[number];

export interface TimedLoopOptions<T> extends LoopTimerOptions {
  /** Items to iterate; an infinite counter from 0 when omitted */
  readonly iterable?: Iterable<T>;
  readonly seconds?: number;
  readonly minutes?: number;
  readonly hours?: number;
  /** default: "overtime" */
  readonly cutoff?: CutoffPolicy;
}

export interface ResolvedTimedLoopOptions extends ResolvedLoopTimerOptions {
  /** Time budget in seconds */
  readonly threshold: number;
  readonly cutoff: CutoffPolicy;
}

export interface NowOptions {
  /** strftime-style pattern */
  readonly format?: string;
  /** Use the long default pattern (weekday and month names) */
  readonly long?: boolean;
  readonly print?: boolean;
}

export interface ReportTextOptions extends ReportOptions {
  /** Positional values for `{}` / `{0}` placeholders in the message */
  readonly values?: readonly unknown[];
  /** Named values for `{name}` placeholders in the message */
  readonly fields?: Readonly<Record<string, unknown>>;
  /** Reset the watch before reporting */
  readonly reset?: boolean;
}

/** Summary of recorded laps, in seconds */
export interface LapStatistics {
  readonly count: number;
  readonly min: number;
  readonly max: number;
  readonly mean: number;
  readonly median: number;
  /** Sample standard deviation; null when exactly one lap is recorded */
  readonly stdev: number | null;
}
