import { DEFAULT_HMS_FORMAT, DEFAULT_SECONDS_FORMAT } from "./constants.js";
import { formatTemplate } from "./format.js";
import { secondsToHms } from "./hms.js";
import type { Report, ReportOptions, ResolvedReportOptions, ResolvedStopwatchConfig } from "./types.js";

/**
 * Merge per-call report options over the stopwatch defaults.
 * Without an explicit format, the default follows the effective `hms`.
 */
export function resolveReportOptions(
  defaults: ResolvedStopwatchConfig,
  overrides: ReportOptions = {},
): ResolvedReportOptions {
  const hms = overrides.hms ?? defaults.hms;
  return {
    numeric: overrides.numeric ?? defaults.numeric,
    hms,
    format: overrides.format ?? defaults.format ?? (hms ? DEFAULT_HMS_FORMAT : DEFAULT_SECONDS_FORMAT),
    process: overrides.process ?? defaults.process,
  };
}

/**
 * Turn raw seconds into a report.
 *
 * - `process` set: its result is returned as-is
 * - numeric: `[h, m, s]` when `hms`, else the seconds
 * - otherwise: the format template applied to `[h, m, s]` or `[seconds]`
 *
 * @throws {StopwatchInvalidFormatError} when the template cannot be rendered
 */
export function buildReport(seconds: number, options: ResolvedReportOptions): Report {
  if (options.process) {
    return options.process(seconds);
  }
  if (options.numeric) {
    return options.hms ? secondsToHms(seconds) : seconds;
  }
  return formatTemplate(options.format, options.hms ? secondsToHms(seconds) : [seconds]);
}

/** Printable text of a report */
export function renderReport(report: Report): string {
  if (typeof report === "string") return report;
  if (typeof report === "number") return String(report);
  return `(${report.join(", ")})`;
}
