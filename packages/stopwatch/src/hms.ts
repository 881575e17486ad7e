import { SECONDS_PER_HOUR, SECONDS_PER_MINUTE } from "./constants.js";
import type { Hms } from "./types.js";

/** Remainder with the sign of the divisor */
function floorMod(value: number, divisor: number): number {
  const remainder = value % divisor;
  return remainder < 0 ? remainder + divisor : remainder;
}

/**
 * Split seconds into whole hours, whole minutes and remaining seconds.
 * `hmsToSeconds(...secondsToHms(x)) === x` for every finite x >= 0.
 */
export function secondsToHms(seconds: number): Hms {
  const hours = Math.floor(seconds / SECONDS_PER_HOUR);
  const minutes = Math.floor(floorMod(seconds, SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  return [hours, minutes, floorMod(seconds, SECONDS_PER_MINUTE)];
}

/** Combine hours, minutes and seconds into seconds */
export function hmsToSeconds(hours: number, minutes: number, seconds: number): number {
  return hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE + seconds;
}
