/**
 * Platform clocks (all readings in seconds).
 *
 * Tests inject a fake clock through `StopwatchConfig.clock` instead.
 */

import type { Clock, TimeSourceName } from "./types.js";

/** High-resolution monotonic clock */
export const perfCounterClock: Clock = {
  now: () => performance.now() / 1_000,
};

/** Monotonic clock with millisecond ticks */
export const monotonicClock: Clock = {
  now: () => Math.floor(performance.now()) / 1_000,
};

/** CPU time (user + system) consumed by this process */
export const processTimeClock: Clock = {
  now: () => {
    const usage = process.cpuUsage();
    return (usage.user + usage.system) / 1_000_000;
  },
};

/** Wall-clock time since the Unix epoch; can jump when the system clock is adjusted */
export const wallClock: Clock = {
  now: () => Date.now() / 1_000,
};

export const TIME_SOURCES: Readonly<Record<TimeSourceName, Clock>> = {
  "perf-counter": perfCounterClock,
  monotonic: monotonicClock,
  "process-time": processTimeClock,
  "wall-clock": wallClock,
};
