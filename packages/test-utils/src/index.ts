export const PACKAGE_NAME = "@lapwatch/test-utils" as const;

export { FakeClock, SteppingClock } from "./clock.js";
export { createOutputRecorder, type OutputRecorder } from "./output.js";
