/**
 * Constants for @lapwatch/stopwatch.
 */

export const PACKAGE_NAME = "@lapwatch/stopwatch";

/** Tag used to prefix diagnostic log lines */
export const LOG_TAG = "lapwatch";

export const TIME_SOURCE_NAMES = ["perf-counter", "monotonic", "process-time", "wall-clock"] as const;
export const DEFAULT_TIME_SOURCE = "perf-counter";

export const CUTOFF_POLICIES = ["overtime", "last-lap", "mean-lap", "median-lap", "max-lap"] as const;
export const DEFAULT_CUTOFF_POLICY = "overtime";

/** H:MM:SS.ss */
export const DEFAULT_HMS_FORMAT = "{0:.0f}:{1:02.0f}:{2:05.2f}";
/** Plain seconds, two decimals */
export const DEFAULT_SECONDS_FORMAT = "{0:.2f}";

export const DEFAULT_LAP_TEMPLATE = "Lap Time: {l}; \tTotal Time: {c}";
export const DEFAULT_LAP_AFTER_TEMPLATE = "Hits: {h}; \tLap Time: {l}; \tTotal Time: {c}";

export const DEFAULT_NOW_FORMAT = "%Y-%m-%d %H:%M:%S";
export const DEFAULT_LONG_NOW_FORMAT = "%A %B %d, %Y %H:%M:%S";

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 3_600;
