/**
 * Cut-off decisions for time-bounded loops.
 */

import { maximum, mean, median } from "./statistics.js";
import type { CutoffPolicy } from "./types.js";

/** Expected duration of the next lap under a predictive policy */
export function predictNextLap(
  policy: Exclude<CutoffPolicy, "overtime">,
  laps: readonly number[],
): number {
  switch (policy) {
    case "last-lap":
      return laps.at(-1) ?? 0;
    case "mean-lap":
      return mean(laps);
    case "median-lap":
      return median(laps);
    case "max-lap":
      return maximum(laps);
  }
}

/**
 * Whether a timed loop should stop now.
 *
 * "overtime" stops once the budget is spent; the predictive policies stop
 * when the next chunk is expected to overrun it.
 */
export function shouldCutOff(
  policy: CutoffPolicy,
  elapsed: number,
  threshold: number,
  laps: readonly number[],
  chunkSize: number,
): boolean {
  if (policy === "overtime") {
    return elapsed >= threshold;
  }
  return elapsed + predictNextLap(policy, laps) * chunkSize > threshold;
}
