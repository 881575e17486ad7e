import {
  getErrorMessage,
  StopwatchInvalidArgumentError,
  StopwatchSyncTargetError,
} from "@lapwatch/errors";
import { resolveLoopTimerOptions, resolveStopwatchConfig, resolveTimedLoopOptions } from "./config.js";
import {
  DEFAULT_LAP_AFTER_TEMPLATE,
  DEFAULT_LAP_TEMPLATE,
  DEFAULT_LONG_NOW_FORMAT,
  DEFAULT_NOW_FORMAT,
} from "./constants.js";
import { shouldCutOff } from "./cutoff.js";
import { formatClock } from "./datetime.js";
import { formatTemplate } from "./format.js";
import { chunk, infiniteCount, knownSize } from "./iteration.js";
import { logWarn } from "./logger.js";
import { buildReport, renderReport, resolveReportOptions } from "./report.js";
import { maximum, mean, median, minimum, sampleStdev } from "./statistics.js";
import type {
  CheckOptions,
  Clock,
  FunctionTimerOptions,
  LapAfterOptions,
  LapOptions,
  LapReport,
  LapStatistics,
  LoopTimerOptions,
  NowOptions,
  Report,
  ReportOptions,
  ReportTextOptions,
  ResetOptions,
  ResolvedLoopTimerOptions,
  ResolvedStopwatchConfig,
  ResolvedTimedLoopOptions,
  StopwatchConfig,
  TimedLoopOptions,
  TimeSourceName,
} from "./types.js";

/**
 * A stopwatch measuring active time across pause/resume cycles, with lap
 * splitting, hit-gated reporting, lap statistics and timed iteration.
 *
 * Elapsed time is always derived from clock readings:
 * total = (pausedAt ?? now) - start - pauseOffset and
 * lap = (pausedAt ?? now) - split - lapPauseOffset.
 *
 * Instances are not safe to share between concurrent callers.
 */
export class Stopwatch {
  private readonly config: ResolvedStopwatchConfig;

  private startRef = 0;
  private splitRef = 0;
  /** Reading at the moment of pausing; null while active */
  private pausedAt: number | null = null;
  private pauseOffset = 0;
  private lapPauseOffset = 0;
  private recordedLaps: number[] = [];
  private hitCount = 0;
  private lastLapSeconds = 0;
  private lastCheckSeconds = 0;
  private breakRequested = false;
  private timedCalls = 0;

  /**
   * @throws {StopwatchConfigurationError} on invalid options or an unsupported time source
   */
  constructor(config?: StopwatchConfig) {
    this.config = resolveStopwatchConfig(config);
    this.reset({ startActive: this.config.startActive });
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  get active(): boolean {
    return this.pausedAt === null;
  }

  get inactive(): boolean {
    return this.pausedAt !== null;
  }

  get hits(): number {
    return this.hitCount;
  }

  get timeSource(): TimeSourceName {
    return this.config.timeSource;
  }

  get clock(): Clock {
    return this.config.clock;
  }

  /** Total elapsed seconds computed by the most recent check */
  get lastCheck(): number {
    return this.lastCheckSeconds;
  }

  /** Duration of the most recently committed lap, in seconds */
  get lastLap(): number {
    return this.lastLapSeconds;
  }

  /** Committed lap durations in seconds, oldest first */
  get lapTimes(): readonly number[] {
    return [...this.recordedLaps];
  }

  /** Current reading, frozen at the pause reading while paused */
  private get reference(): number {
    return this.pausedAt ?? this.config.clock.now();
  }

  // -------------------------------------------------------------------------
  // Pause / start / reset
  // -------------------------------------------------------------------------

  /** Pause the watch; no-op when already paused or `flag` is false */
  pause(flag = true): void {
    if (flag && this.pausedAt === null) {
      this.pausedAt = this.config.clock.now();
    }
  }

  /** Resume the watch; no-op when already active or `flag` is false */
  start(flag = true): void {
    if (flag && this.pausedAt !== null) {
      const paused = this.config.clock.now() - this.pausedAt;
      this.pauseOffset += paused;
      this.lapPauseOffset += paused;
      this.pausedAt = null;
    }
  }

  /**
   * Reinitialize every field. The start, pause offset and pause references
   * can be supplied to adopt another stopwatch's epoch (see {@link sync}).
   */
  reset(options: ResetOptions = {}): void {
    const start = options.start ?? this.config.clock.now();
    this.startRef = start;
    this.splitRef = start;
    this.pausedAt = (options.startActive ?? true) ? null : (options.pausedAt ?? start);
    this.pauseOffset = options.pauseOffset ?? 0;
    // An adopted epoch starts its first lap at `start`, so the pauses already
    // taken belong to that lap as well.
    this.lapPauseOffset = options.start === undefined ? 0 : (options.pauseOffset ?? 0);
    this.recordedLaps = [];
    this.hitCount = 0;
    this.lastLapSeconds = 0;
    this.lastCheckSeconds = 0;
    this.breakRequested = false;
  }

  // -------------------------------------------------------------------------
  // Checks and laps
  // -------------------------------------------------------------------------

  /** Total active time. `autoPause` is applied before `autoStart`. */
  check(options: CheckOptions = {}): Report {
    this.applyAutoControls(options);
    const report = this.toReport(this.totalAt(this.reference), options);
    if (options.print) {
      this.config.output(renderReport(report));
    }
    return report;
  }

  /**
   * Close the current lap and open a new one.
   *
   * The lap is committed only when logging is enabled and the watch is
   * active or the lap has positive duration, so a paused watch with no
   * progress never records an empty lap.
   */
  lap(options: LapOptions & { readonly withTotal: true }): LapReport;
  lap(options?: LapOptions & { readonly withTotal?: false }): Report;
  lap(options?: LapOptions): Report | LapReport;
  lap(options: LapOptions = {}): Report | LapReport {
    this.applyAutoControls(options);

    const split = this.reference;
    const lapSeconds = split - this.splitRef - this.lapPauseOffset;
    if ((options.log ?? true) && (this.pausedAt === null || lapSeconds > 0)) {
      this.recordedLaps.push(lapSeconds);
      this.lastLapSeconds = lapSeconds;
      this.splitRef = split;
      this.lapPauseOffset = 0;
    }

    const lapReport = this.toReport(lapSeconds, options);
    const totalReport = this.toReport(this.totalAt(split), options);
    if (options.print) {
      this.config.output(
        formatTemplate(options.template ?? DEFAULT_LAP_TEMPLATE, [], {
          l: renderReport(lapReport),
          c: renderReport(totalReport),
        }),
      );
    }
    return options.withTotal ? [lapReport, totalReport] : lapReport;
  }

  /** Increase the hit count */
  hit(count = 1): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new StopwatchInvalidArgumentError("count", `must be a non-negative integer, got ${count}`);
    }
    this.hitCount += count;
  }

  resetHits(): void {
    this.hitCount = 0;
  }

  /**
   * Register a hit and check the watch on every `after`-th hit.
   *
   * @returns the report, or null between reporting hits
   * @throws {StopwatchInvalidArgumentError} when `after` is not a positive integer
   */
  checkAfter(after: number, options: CheckOptions = {}): Report | null {
    validateAfter(after);
    this.applyAutoControls(options);
    this.hit();
    if (this.hitCount % after !== 0) {
      return null;
    }
    return this.check({ ...options, autoStart: false, autoPause: false });
  }

  /**
   * Register a hit and split a lap on every `after`-th hit.
   *
   * @returns the lap report (or `[lap, total]`), or null between reporting hits
   * @throws {StopwatchInvalidArgumentError} when `after` is not a positive integer
   */
  lapAfter(after: number, options: LapAfterOptions & { readonly withTotal: true }): LapReport | null;
  lapAfter(after: number, options?: LapAfterOptions & { readonly withTotal?: false }): Report | null;
  lapAfter(after: number, options?: LapAfterOptions): Report | LapReport | null;
  lapAfter(after: number, options: LapAfterOptions = {}): Report | LapReport | null {
    validateAfter(after);
    this.applyAutoControls(options);
    this.hit();
    if (this.hitCount % after !== 0) {
      return null;
    }

    const [lapReport, totalReport] = this.lap({
      ...options,
      autoStart: false,
      autoPause: false,
      print: false,
      withTotal: true,
    });
    if (options.print) {
      this.config.output(
        formatTemplate(options.template ?? DEFAULT_LAP_AFTER_TEMPLATE, [], {
          ...options.templateValues,
          h: this.hitCount,
          l: renderReport(lapReport),
          c: renderReport(totalReport),
        }),
      );
    }
    return options.withTotal ? [lapReport, totalReport] : lapReport;
  }

  // -------------------------------------------------------------------------
  // Lap statistics
  // -------------------------------------------------------------------------

  /** Every committed lap as a report */
  laps(options: ReportOptions = {}): Report[] {
    return this.recordedLaps.map((seconds) => this.toReport(seconds, options));
  }

  lastLapValue(options: ReportOptions = {}): Report {
    return this.toReport(this.recordedLaps.at(-1) ?? 0, options);
  }

  minLap(options: ReportOptions = {}): Report {
    return this.toReport(minimum(this.recordedLaps), options);
  }

  maxLap(options: ReportOptions = {}): Report {
    return this.toReport(maximum(this.recordedLaps), options);
  }

  meanLap(options: ReportOptions = {}): Report {
    return this.toReport(mean(this.recordedLaps), options);
  }

  medianLap(options: ReportOptions = {}): Report {
    return this.toReport(median(this.recordedLaps), options);
  }

  /**
   * Sample standard deviation of the laps; 0 with no laps.
   *
   * @throws {StopwatchInsufficientDataError} when exactly one lap is recorded
   */
  stdevLap(options: ReportOptions = {}): Report {
    return this.toReport(sampleStdev(this.recordedLaps), options);
  }

  /** Numeric summary of the laps */
  lapStatistics(): LapStatistics {
    const laps = this.recordedLaps;
    return {
      count: laps.length,
      min: minimum(laps),
      max: maximum(laps),
      mean: mean(laps),
      median: median(laps),
      stdev: laps.length === 1 ? null : sampleStdev(laps),
    };
  }

  /** Print the lap summary through the output sink */
  stats(options: ReportOptions = {}): void {
    const summary = this.lapStatistics();
    const show = (seconds: number): string => renderReport(this.toReport(seconds, options));
    const lines = [
      "Lap Statistics",
      "--------------",
      `Count:  ${summary.count} laps`,
      `Range:  ${show(summary.min)} - ${show(summary.max)}`,
      `Median: ${show(summary.median)}`,
      `Mean:   ${show(summary.mean)}`,
      `Stdev.: ${summary.stdev === null ? "n/a" : show(summary.stdev)}`,
      "--------------",
    ];
    for (const line of lines) {
      this.config.output(line);
    }
  }

  // -------------------------------------------------------------------------
  // Function timers
  // -------------------------------------------------------------------------

  /**
   * Wrap `fn` so each call is timed as one lap, with the watch paused
   * between calls. Resets the watch (paused). Arguments, return value and
   * thrown errors pass through unchanged; the lap is committed either way.
   * A call made while another is still running (recursion) is folded into
   * the outer call's lap.
   */
  functionTimer<A extends unknown[], R>(
    fn: (...args: A) => R,
    options: FunctionTimerOptions = {},
  ): (...args: A) => R {
    this.reset({ startActive: false });
    this.timedCalls = 0;
    return (...args: A): R => {
      this.enterOperation();
      try {
        return fn(...args);
      } catch (error) {
        logWarn(`Timed function threw: ${getErrorMessage(error)}`);
        throw error;
      } finally {
        this.leaveOperation(options);
      }
    };
  }

  /**
   * Like {@link functionTimer} for functions returning promises. Calls may
   * overlap: the watch runs while at least one call is pending, and the lap
   * is committed when the last pending promise settles, so concurrent calls
   * share one lap covering their combined span.
   */
  asyncFunctionTimer<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>,
    options: FunctionTimerOptions = {},
  ): (...args: A) => Promise<R> {
    this.reset({ startActive: false });
    this.timedCalls = 0;
    return async (...args: A): Promise<R> => {
      this.enterOperation();
      try {
        return await fn(...args);
      } catch (error) {
        logWarn(`Timed function rejected: ${getErrorMessage(error)}`);
        throw error;
      } finally {
        this.leaveOperation(options);
      }
    };
  }

  private enterOperation(): void {
    if (this.timedCalls === 0) this.start();
    this.timedCalls += 1;
  }

  private leaveOperation(options: FunctionTimerOptions): void {
    this.timedCalls -= 1;
    if (this.timedCalls > 0) return;
    const operation = this.lap({ autoPause: true });
    if (options.report) {
      this.config.output(`Operation time: ${renderReport(operation)}`);
    }
  }

  // -------------------------------------------------------------------------
  // Loop timers
  // -------------------------------------------------------------------------

  /**
   * Iterate `iterable`, timing each chunk of `chunkSize` items as one lap.
   * Resets the watch (paused) when iteration begins.
   *
   * @throws {StopwatchInvalidArgumentError} when chunkSize is not a positive integer
   */
  loopTimer<T>(iterable: Iterable<T>, options: LoopTimerOptions = {}): Generator<T, void, undefined> {
    return this.runLoopTimer(iterable, resolveLoopTimerOptions(options));
  }

  private *runLoopTimer<T>(
    iterable: Iterable<T>,
    { chunkSize, report }: ResolvedLoopTimerOptions,
  ): Generator<T, void, undefined> {
    if (report) {
      const size = knownSize(iterable);
      const chunks = size === undefined ? "unknown" : Math.ceil(size / chunkSize);
      this.config.output(`Begin loop timer (${size ?? "unknown"} items in ${chunks} chunks).`);
    }
    this.reset({ startActive: false });

    let chunkIndex = 0;
    for (const items of chunk(iterable, chunkSize)) {
      this.start();
      let yielded = 0;
      for (const item of items) {
        yield item;
        yielded++;
        if (this.breakRequested) break;
      }

      const [split, total] = this.lap({ withTotal: true });
      if (report) {
        const first = chunkIndex * chunkSize + 1;
        this.config.output(
          formatTemplate("Items: {:,d} - {:,d} \tSplit time: {} \tTotal time: {}", [
            first,
            first + yielded - 1,
            renderReport(split),
            renderReport(total),
          ]),
        );
      }
      chunkIndex++;
      if (this.breakRequested) break;
    }

    if (report) {
      this.config.output("End loop timer.");
    }
  }

  /**
   * Iterate for a bounded amount of active time.
   *
   * After every `chunkSize`-th item the elapsed time is compared with the
   * budget: "overtime" stops once it is spent; the lap-based policies stop
   * early when the next chunk is predicted to overrun it.
   *
   * @throws {StopwatchInvalidArgumentError} on an unknown cutoff policy or invalid budget
   */
  timedLoop(options?: TimedLoopOptions<number> & { readonly iterable?: undefined }): Generator<number, void, undefined>;
  timedLoop<T>(options: TimedLoopOptions<T> & { readonly iterable: Iterable<T> }): Generator<T, void, undefined>;
  timedLoop<T>(options: TimedLoopOptions<T> = {}): Generator<T | number, void, undefined> {
    const resolved = resolveTimedLoopOptions(options);
    const source: Iterable<T | number> = options.iterable ?? infiniteCount();
    return this.runTimedLoop(source, resolved);
  }

  private *runTimedLoop<T>(
    source: Iterable<T>,
    { chunkSize, report, threshold, cutoff }: ResolvedTimedLoopOptions,
  ): Generator<T, void, undefined> {
    let index = 0;
    for (const item of this.runLoopTimer(source, { chunkSize, report })) {
      yield item;
      if (index % chunkSize === 0) {
        const elapsed = this.totalAt(this.reference);
        if (shouldCutOff(cutoff, elapsed, threshold, this.recordedLaps, chunkSize)) {
          this.breakRequested = true;
        }
      }
      index++;
    }
  }

  // -------------------------------------------------------------------------
  // Synchronization
  // -------------------------------------------------------------------------

  /**
   * Reset each target onto this watch's epoch, activity and pause
   * accounting. Targets must read the same clock for the values to agree.
   *
   * @throws {StopwatchSyncTargetError} at the first target that is not a Stopwatch;
   * earlier targets keep their sync
   */
  sync(...targets: Stopwatch[]): void {
    targets.forEach((target, position) => {
      if (!(target instanceof Stopwatch)) {
        throw new StopwatchSyncTargetError(position, describeValue(target));
      }
      target.reset({
        startActive: this.active,
        start: this.startRef,
        pauseOffset: this.pauseOffset,
        ...(this.pausedAt === null ? {} : { pausedAt: this.pausedAt }),
      });
    });
  }

  // -------------------------------------------------------------------------
  // Text reports
  // -------------------------------------------------------------------------

  /** Current local time as text */
  now(options: NowOptions = {}): string {
    const pattern = options.format ?? (options.long ? DEFAULT_LONG_NOW_FORMAT : DEFAULT_NOW_FORMAT);
    const text = formatClock(new Date(), pattern);
    if (options.print) {
      this.config.output(text);
    }
    return text;
  }

  /** Print `[<elapsed>] <message>` */
  report(text: string, options: ReportTextOptions = {}): void {
    let elapsed: Report;
    if (options.reset) {
      this.reset({ startActive: false });
      elapsed = this.check({ ...options, autoStart: true });
    } else {
      elapsed = this.check(options);
    }
    this.config.output(`[${renderReport(elapsed)}] ${renderMessage(text, options)}`);
  }

  /** Reset the watch, then report */
  reportNew(text: string, options: ReportTextOptions = {}): void {
    this.report(text, { ...options, reset: true });
  }

  /** Print the start time, then behave as {@link reportNew} */
  reportBegin(text: string, options: ReportTextOptions = {}): void {
    this.config.output(`START TIME: ${this.now()}`);
    this.reportNew(text, options);
  }

  /** Report, then print the end time */
  reportEnd(text: string, options: ReportTextOptions = {}): void {
    this.report(text, { ...options, reset: false });
    this.config.output(`END TIME:   ${this.now()}`);
  }

  /** Print `[<local time>] <message>` */
  reportNow(text: string, options: ReportTextOptions & Pick<NowOptions, "format" | "long"> = {}): void {
    const stamp = this.now({
      ...(options.format === undefined ? {} : { format: options.format }),
      ...(options.long === undefined ? {} : { long: options.long }),
    });
    this.config.output(`[${stamp}] ${renderMessage(text, options)}`);
  }

  toString(): string {
    return renderReport(this.check({ numeric: false }));
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** Pause, then start: requesting both leaves the watch active */
  private applyAutoControls(options: CheckOptions): void {
    this.pause(options.autoPause ?? false);
    this.start(options.autoStart ?? false);
  }

  private totalAt(stamp: number): number {
    this.lastCheckSeconds = stamp - this.startRef - this.pauseOffset;
    return this.lastCheckSeconds;
  }

  private toReport(seconds: number, options: ReportOptions): Report {
    return buildReport(seconds, resolveReportOptions(this.config, options));
  }
}

function validateAfter(after: number): void {
  if (!Number.isInteger(after) || after <= 0) {
    throw new StopwatchInvalidArgumentError("after", `must be a positive integer, got ${after}`);
  }
}

function renderMessage(text: string, options: ReportTextOptions): string {
  return formatTemplate(text, options.values ?? [], options.fields ?? {});
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}
