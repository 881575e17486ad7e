/**
 * @lapwatch/stopwatch
 *
 * Pausable stopwatch with lap splitting and timed iteration.
 *
 * Provides:
 * - Active-time measurement across pause/resume cycles
 * - Laps, hit-gated checks and lap statistics
 * - Function and loop timers, including time-budgeted loops with cutoff policies
 * - Configurable reports: formatted text, seconds, or h/m/s triples
 */

// Clock
export { monotonicClock, perfCounterClock, processTimeClock, TIME_SOURCES, wallClock } from "./clock.js";
// Config
export {
  LoopTimerOptionsSchema,
  resolveLoopTimerOptions,
  resolveStopwatchConfig,
  resolveTimedLoopOptions,
  StopwatchConfigSchema,
  TimedLoopOptionsSchema,
} from "./config.js";
// Constants
export {
  CUTOFF_POLICIES,
  DEFAULT_CUTOFF_POLICY,
  DEFAULT_HMS_FORMAT,
  DEFAULT_LAP_AFTER_TEMPLATE,
  DEFAULT_LAP_TEMPLATE,
  DEFAULT_LONG_NOW_FORMAT,
  DEFAULT_NOW_FORMAT,
  DEFAULT_SECONDS_FORMAT,
  DEFAULT_TIME_SOURCE,
  PACKAGE_NAME,
  TIME_SOURCE_NAMES,
} from "./constants.js";
// Cutoff
export { predictNextLap, shouldCutOff } from "./cutoff.js";
// Formatting
export { formatClock } from "./datetime.js";
export { formatTemplate } from "./format.js";
export { hmsToSeconds, secondsToHms } from "./hms.js";
// Convenience
export { stopwatch, timedLoop } from "./helpers.js";
// Iteration
export { chunk, infiniteCount, knownSize } from "./iteration.js";
// Reports
export { buildReport, renderReport, resolveReportOptions } from "./report.js";
// Statistics
export { maximum, mean, median, minimum, sampleStdev } from "./statistics.js";
// Stopwatch
export { Stopwatch } from "./stopwatch.js";
// Types
export type {
  CheckOptions,
  Clock,
  CutoffPolicy,
  FunctionTimerOptions,
  Hms,
  LapAfterOptions,
  LapOptions,
  LapReport,
  LapStatistics,
  LoopTimerOptions,
  NowOptions,
  Printer,
  Report,
  ReportOptions,
  ReportProcessor,
  ReportTextOptions,
  ResetOptions,
  ResolvedLoopTimerOptions,
  ResolvedReportOptions,
  ResolvedStopwatchConfig,
  ResolvedTimedLoopOptions,
  StopwatchConfig,
  TimedLoopOptions,
  TimeSourceName,
} from "./types.js";
