import { LOG_TAG } from "./constants.js";

/**
 * Log a warning with a consistent format: [lapwatch] message
 */
export function logWarn(message: string): void {
  console.warn(`[${LOG_TAG}] ${message}`);
}
