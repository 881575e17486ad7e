import { Stopwatch } from "./stopwatch.js";
import type { CheckOptions, Report, StopwatchConfig, TimedLoopOptions } from "./types.js";

/**
 * Create a stopwatch and return its check function.
 *
 * @example
 * ```ts
 * const elapsed = stopwatch({ hms: false });
 * doWork();
 * console.log(elapsed()); // "1.25"
 * ```
 */
export function stopwatch(config?: StopwatchConfig): (options?: CheckOptions) => Report {
  const watch = new Stopwatch(config);
  return (options?: CheckOptions) => watch.check(options);
}

/** Run a timed loop on a fresh stopwatch */
export function timedLoop(
  options?: TimedLoopOptions<number> & { readonly iterable?: undefined },
  config?: StopwatchConfig,
): Generator<number, void, undefined>;
export function timedLoop<T>(
  options: TimedLoopOptions<T> & { readonly iterable: Iterable<T> },
  config?: StopwatchConfig,
): Generator<T, void, undefined>;
export function timedLoop<T>(
  options: TimedLoopOptions<T> = {},
  config?: StopwatchConfig,
): Generator<T | number, void, undefined> {
  const watch = new Stopwatch(config);
  const { iterable, ...rest } = options;
  return iterable === undefined ? watch.timedLoop(rest) : watch.timedLoop({ ...rest, iterable });
}
