import {
  StopwatchConfigurationError,
  StopwatchInsufficientDataError,
  StopwatchInvalidArgumentError,
  StopwatchSyncTargetError,
} from "@lapwatch/errors";
import { createOutputRecorder, FakeClock, SteppingClock } from "@lapwatch/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { wallClock } from "../../clock.js";
import { Stopwatch } from "../../stopwatch.js";
import type { StopwatchConfig } from "../../types.js";

const SECONDS = { numeric: true, hms: false } as const;

function createWatch(config: StopwatchConfig = {}): {
  watch: Stopwatch;
  clock: FakeClock;
  output: ReturnType<typeof createOutputRecorder>;
} {
  const clock = new FakeClock();
  const output = createOutputRecorder();
  const watch = new Stopwatch({ clock, output: output.write, ...config });
  return { watch, clock, output };
}

function createGate(): { promise: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

describe("Stopwatch", () => {
  describe("construction", () => {
    it("should start active by default", () => {
      const { watch, clock } = createWatch();
      clock.advance(5);

      expect(watch.active).toBe(true);
      expect(watch.check()).toBe("0:00:05.00");
    });

    it("should stay paused when created inactive", () => {
      const { watch, clock } = createWatch({ startActive: false });
      clock.advance(5);

      expect(watch.inactive).toBe(true);
      expect(watch.check(SECONDS)).toBe(0);
    });

    it("should expose the time source and clock", () => {
      const watch = new Stopwatch({ timeSource: "wall-clock" });

      expect(watch.timeSource).toBe("wall-clock");
      expect(watch.clock).toBe(wallClock);
    });

    it("should reject invalid configuration", () => {
      expect(() => new Stopwatch({ format: "" })).toThrow(StopwatchConfigurationError);
    });

    it("should read the clock on every active check", () => {
      const watch = new Stopwatch({ clock: new SteppingClock(1) });

      expect(watch.check(SECONDS)).toBe(1);
      expect(watch.check(SECONDS)).toBe(2);
    });
  });

  describe("pause / start", () => {
    it("should exclude paused time from the total", () => {
      const { watch, clock } = createWatch();
      clock.advance(2);
      watch.pause();
      clock.advance(3);

      expect(watch.check(SECONDS)).toBe(2);

      watch.start();
      clock.advance(1);
      expect(watch.check(SECONDS)).toBe(3);
    });

    it("should ignore redundant pauses and starts", () => {
      const { watch, clock } = createWatch();
      clock.advance(2);
      watch.pause();
      clock.advance(1);
      watch.pause();
      clock.advance(1);
      watch.start();
      watch.start();
      clock.advance(1);

      expect(watch.check(SECONDS)).toBe(3);
    });

    it("should honor the flag argument", () => {
      const { watch } = createWatch();
      watch.pause(false);
      expect(watch.active).toBe(true);
    });

    it("should resume with autoStart", () => {
      const { watch, clock } = createWatch({ startActive: false });
      clock.advance(4);
      watch.check({ autoStart: true });
      clock.advance(1);

      expect(watch.active).toBe(true);
      expect(watch.check(SECONDS)).toBe(1);
    });

    it("should pause with autoPause after reporting the current total", () => {
      const { watch, clock } = createWatch();
      clock.advance(2);

      expect(watch.check({ ...SECONDS, autoPause: true })).toBe(2);
      expect(watch.inactive).toBe(true);
    });

    it("should end active when both autoPause and autoStart are requested", () => {
      const { watch, clock } = createWatch();
      clock.advance(2);

      expect(watch.check({ ...SECONDS, autoPause: true, autoStart: true })).toBe(2);
      expect(watch.active).toBe(true);
    });
  });

  describe("reset", () => {
    it("should clear laps, hits and elapsed time", () => {
      const { watch, clock } = createWatch();
      clock.advance(5);
      watch.lap();
      watch.hit();
      watch.reset();

      expect(watch.hits).toBe(0);
      expect(watch.lapTimes).toEqual([]);
      expect(watch.lastLap).toBe(0);
      expect(watch.check(SECONDS)).toBe(0);
    });

    it("should reset into the paused state on request", () => {
      const { watch } = createWatch();
      watch.reset({ startActive: false });
      expect(watch.inactive).toBe(true);
    });
  });

  describe("reports", () => {
    it("should follow per-call hms for the default format", () => {
      const { watch, clock } = createWatch();
      clock.advance(5);

      expect(watch.check({ hms: false })).toBe("5.00");
      expect(watch.check({ numeric: true })).toEqual([0, 0, 5]);
    });

    it("should use a configured format", () => {
      const { watch, clock } = createWatch({ hms: false, format: "{0:.1f}s" });
      clock.advance(5);

      expect(watch.check()).toBe("5.0s");
    });

    it("should let process supersede the other options", () => {
      const { watch, clock } = createWatch({ process: (seconds) => `${seconds} seconds` });
      clock.advance(5);

      expect(watch.check({ numeric: true })).toBe("5 seconds");
    });

    it("should print checks through the output sink", () => {
      const { watch, clock, output } = createWatch();
      clock.advance(5);

      expect(watch.check({ print: true })).toBe("0:00:05.00");
      expect(output.lines).toEqual(["0:00:05.00"]);
    });

    it("should remember the last check", () => {
      const { watch, clock } = createWatch();
      clock.advance(5);
      watch.check();

      expect(watch.lastCheck).toBe(5);
    });

    it("should render as text", () => {
      const { watch, clock } = createWatch({ numeric: true });
      clock.advance(5);

      expect(String(watch)).toBe("0:00:05.00");
    });
  });

  describe("laps", () => {
    it("should split consecutive laps", () => {
      const { watch, clock } = createWatch();
      clock.advance(2);
      expect(watch.lap(SECONDS)).toBe(2);
      clock.advance(3);
      expect(watch.lap(SECONDS)).toBe(3);

      expect(watch.lapTimes).toEqual([2, 3]);
      expect(watch.lastLap).toBe(3);
    });

    it("should return the total alongside the lap", () => {
      const { watch, clock } = createWatch();
      clock.advance(5);
      watch.lap();
      clock.advance(1);

      expect(watch.lap({ ...SECONDS, withTotal: true })).toEqual([1, 6]);
    });

    it("should exclude paused time from the lap", () => {
      const { watch, clock } = createWatch();
      clock.advance(2);
      watch.pause();
      clock.advance(5);
      watch.start();
      clock.advance(1);

      expect(watch.lap({ ...SECONDS, withTotal: true })).toEqual([3, 3]);
    });

    it("should not record empty laps while paused", () => {
      const { watch } = createWatch({ startActive: false });

      expect(watch.lap(SECONDS)).toBe(0);
      expect(watch.lapTimes).toEqual([]);
    });

    it("should record progress made before a pause only once", () => {
      const { watch, clock } = createWatch();
      clock.advance(2);
      watch.pause();
      watch.lap();
      clock.advance(3);
      watch.lap();

      expect(watch.lapTimes).toEqual([2]);
    });

    it("should leave the split untouched when not logging", () => {
      const { watch, clock } = createWatch();
      clock.advance(2);

      expect(watch.lap({ ...SECONDS, log: false })).toBe(2);
      expect(watch.lapTimes).toEqual([]);

      clock.advance(1);
      expect(watch.lap(SECONDS)).toBe(3);
    });

    it("should print with the default template", () => {
      const { watch, clock, output } = createWatch();
      clock.advance(2);
      watch.lap({ hms: false, print: true });

      expect(output.lines).toEqual(["Lap Time: 2.00; \tTotal Time: 2.00"]);
    });

    it("should print with a custom template", () => {
      const { watch, clock, output } = createWatch();
      clock.advance(2);
      watch.lap();
      clock.advance(1);
      watch.lap({ hms: false, print: true, template: "{l}|{c}" });

      expect(output.lines).toEqual(["1.00|3.00"]);
    });
  });

  describe("hits", () => {
    it("should count and reset hits", () => {
      const { watch } = createWatch();
      watch.hit();
      watch.hit(4);
      expect(watch.hits).toBe(5);

      watch.resetHits();
      expect(watch.hits).toBe(0);
    });

    it("should reject negative and fractional hit counts", () => {
      const { watch } = createWatch();
      watch.hit(2);

      expect(() => watch.hit(-2)).toThrow(StopwatchInvalidArgumentError);
      expect(() => watch.hit(1.5)).toThrow(
        'Invalid argument "count": must be a non-negative integer, got 1.5',
      );
      expect(watch.hits).toBe(2);
    });

    it("should check on every n-th hit", () => {
      const { watch, clock } = createWatch();
      clock.advance(1);

      expect(watch.checkAfter(3, SECONDS)).toBeNull();
      expect(watch.checkAfter(3, SECONDS)).toBeNull();
      expect(watch.checkAfter(3, SECONDS)).toBe(1);
      expect(watch.hits).toBe(3);
    });

    it("should lap on every n-th hit", () => {
      const { watch, clock, output } = createWatch();
      clock.advance(1);
      expect(watch.lapAfter(2, { hms: false, print: true })).toBeNull();
      clock.advance(1);
      expect(watch.lapAfter(2, { hms: false, print: true })).toBe("2.00");

      expect(watch.lapTimes).toEqual([2]);
      expect(output.lines).toEqual(["Hits: 2; \tLap Time: 2.00; \tTotal Time: 2.00"]);
    });

    it("should pass extra template values", () => {
      const { watch, clock, output } = createWatch();
      clock.advance(2);
      const report = watch.lapAfter(1, {
        hms: false,
        print: true,
        withTotal: true,
        template: "{name} {h}: {l}",
        templateValues: { name: "batch" },
      });

      expect(report).toEqual(["2.00", "2.00"]);
      expect(output.lines).toEqual(["batch 1: 2.00"]);
    });

    it("should reject a non-positive or fractional interval", () => {
      const { watch } = createWatch();

      expect(() => watch.checkAfter(0)).toThrow(StopwatchInvalidArgumentError);
      expect(() => watch.lapAfter(1.5)).toThrow(
        'Invalid argument "after": must be a positive integer, got 1.5',
      );
      expect(watch.hits).toBe(0);
    });
  });

  describe("lap statistics", () => {
    function watchWithLaps(laps: readonly number[]): ReturnType<typeof createWatch> {
      const setup = createWatch();
      for (const lap of laps) {
        setup.clock.advance(lap);
        setup.watch.lap();
      }
      return setup;
    }

    it("should summarize the recorded laps", () => {
      const { watch } = watchWithLaps([1, 3, 2]);

      expect(watch.laps(SECONDS)).toEqual([1, 3, 2]);
      expect(watch.minLap(SECONDS)).toBe(1);
      expect(watch.maxLap(SECONDS)).toBe(3);
      expect(watch.meanLap(SECONDS)).toBe(2);
      expect(watch.medianLap(SECONDS)).toBe(2);
      expect(watch.stdevLap(SECONDS)).toBe(1);
      expect(watch.lastLapValue(SECONDS)).toBe(2);
      expect(watch.minLap()).toBe("0:00:01.00");
    });

    it("should return numeric statistics", () => {
      const { watch } = watchWithLaps([1, 3, 2]);

      expect(watch.lapStatistics()).toEqual({ count: 3, min: 1, max: 3, mean: 2, median: 2, stdev: 1 });
    });

    it("should report zeros without laps", () => {
      const { watch } = watchWithLaps([]);

      expect(watch.meanLap(SECONDS)).toBe(0);
      expect(watch.stdevLap(SECONDS)).toBe(0);
      expect(watch.lapStatistics()).toEqual({ count: 0, min: 0, max: 0, mean: 0, median: 0, stdev: 0 });
    });

    it("should not compute a deviation from a single lap", () => {
      const { watch } = watchWithLaps([4]);

      expect(() => watch.stdevLap()).toThrow(StopwatchInsufficientDataError);
      expect(watch.lapStatistics().stdev).toBeNull();
    });

    it("should print the summary", () => {
      const { watch, output } = watchWithLaps([1, 3, 2]);
      watch.stats({ hms: false });

      expect(output.lines).toEqual([
        "Lap Statistics",
        "--------------",
        "Count:  3 laps",
        "Range:  1.00 - 3.00",
        "Median: 2.00",
        "Mean:   2.00",
        "Stdev.: 1.00",
        "--------------",
      ]);
    });

    it("should print n/a for the deviation of a single lap", () => {
      const { watch, output } = watchWithLaps([4]);
      watch.stats({ hms: false });

      expect(output.lines[6]).toBe("Stdev.: n/a");
    });
  });

  describe("function timers", () => {
    it("should time each call as a lap and pause between calls", () => {
      const { watch, clock } = createWatch();
      const double = watch.functionTimer((value: number) => {
        clock.advance(2);
        return value * 2;
      });

      expect(double(3)).toBe(6);
      clock.advance(10);
      expect(double(4)).toBe(8);

      expect(watch.lapTimes).toEqual([2, 2]);
      expect(watch.inactive).toBe(true);
      expect(watch.check(SECONDS)).toBe(4);
    });

    it("should print the operation time on request", () => {
      const { watch, clock, output } = createWatch();
      const timed = watch.functionTimer(() => clock.advance(2), { report: true });
      timed();

      expect(output.lines).toEqual(["Operation time: 0:00:02.00"]);
    });

    describe("when the function throws", () => {
      afterEach(() => {
        vi.restoreAllMocks();
      });

      it("should rethrow and still record the lap", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const { watch, clock } = createWatch();
        const failing = watch.functionTimer(() => {
          clock.advance(1);
          throw new Error("fail");
        });

        expect(() => failing()).toThrow("fail");
        expect(watch.lapTimes).toEqual([1]);
        expect(watch.inactive).toBe(true);
        expect(warn).toHaveBeenCalledWith("[lapwatch] Timed function threw: fail");
      });

      it("should rethrow rejections from async functions", async () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const { watch, clock } = createWatch();
        const failing = watch.asyncFunctionTimer(async () => {
          clock.advance(1);
          throw new Error("nope");
        });

        await expect(failing()).rejects.toThrow("nope");
        expect(watch.lapTimes).toEqual([1]);
        expect(warn).toHaveBeenCalledWith("[lapwatch] Timed function rejected: nope");
      });
    });

    it("should time async functions until they settle", async () => {
      const { watch, clock } = createWatch();
      const fetchValue = watch.asyncFunctionTimer(async (key: string) => {
        await Promise.resolve();
        clock.advance(3);
        return `value:${key}`;
      });

      await expect(fetchValue("a")).resolves.toBe("value:a");
      expect(watch.lapTimes).toEqual([3]);
    });

    it("should keep running while overlapping async calls are pending", async () => {
      const { watch, clock } = createWatch();
      const gate = createGate();
      const work = watch.asyncFunctionTimer(async (wait: Promise<void>, seconds: number) => {
        await wait;
        clock.advance(seconds);
        return seconds;
      });

      const slow = work(gate.promise, 3);
      await expect(work(Promise.resolve(), 2)).resolves.toBe(2);
      expect(watch.active).toBe(true);
      expect(watch.lapTimes).toEqual([]);

      gate.open();
      await expect(slow).resolves.toBe(3);
      expect(watch.lapTimes).toEqual([5]);
      expect(watch.inactive).toBe(true);
      expect(watch.check(SECONDS)).toBe(5);
    });
  });

  describe("sync", () => {
    it("should align targets with an active watch", () => {
      const { watch: source, clock } = createWatch();
      clock.advance(5);
      const target = new Stopwatch({ clock });
      source.sync(target);

      expect(target.check(SECONDS)).toBe(5);
      expect(target.active).toBe(true);
    });

    it("should keep the frozen total of a paused watch", () => {
      const { watch: source, clock } = createWatch();
      clock.advance(5);
      source.pause();
      clock.advance(3);
      const target = new Stopwatch({ clock });
      source.sync(target);

      expect(target.inactive).toBe(true);
      expect(target.check(SECONDS)).toBe(5);

      clock.advance(2);
      source.start();
      target.start();
      clock.advance(1);
      expect(target.check(SECONDS)).toBe(6);
      expect(source.check(SECONDS)).toBe(6);
    });

    it("should carry the pauses of a resumed watch into the first lap", () => {
      const { watch: source, clock } = createWatch();
      clock.advance(5);
      source.pause();
      clock.advance(3);
      source.start();
      clock.advance(2);
      const target = new Stopwatch({ clock });
      source.sync(target);

      expect(target.lap({ ...SECONDS, withTotal: true })).toEqual([7, 7]);
      expect(source.lap({ ...SECONDS, withTotal: true })).toEqual([7, 7]);
      expect(target.lapTimes).toEqual([7]);
    });

    it("should reject targets that are not stopwatches", () => {
      const { watch: source, clock } = createWatch();
      clock.advance(5);
      const first = new Stopwatch({ clock });

      expect(() => Reflect.apply(source.sync, source, [first, {}])).toThrow(
        "sync target at position 1 is not a Stopwatch (got Object)",
      );
      expect(() => Reflect.apply(source.sync, source, [null])).toThrow(StopwatchSyncTargetError);
      expect(first.check(SECONDS)).toBe(5);
    });
  });

  describe("clock reports", () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date(2024, 2, 5, 14, 7, 9));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should format the local time", () => {
      const { watch, output } = createWatch();

      expect(watch.now()).toBe("2024-03-05 14:07:09");
      expect(watch.now({ long: true })).toBe("Tuesday March 05, 2024 14:07:09");
      expect(watch.now({ format: "%H:%M", print: true })).toBe("14:07");
      expect(output.lines).toEqual(["14:07"]);
    });

    it("should prefix messages with the elapsed time", () => {
      const { watch, clock, output } = createWatch();
      clock.advance(5);
      watch.report("done {} of {total}", { hms: false, values: [3], fields: { total: 4 } });

      expect(output.lines).toEqual(["[5.00] done 3 of 4"]);
    });

    it("should reset before reporting anew", () => {
      const { watch, clock, output } = createWatch();
      clock.advance(5);
      watch.reportNew("begin", { hms: false });

      expect(output.lines).toEqual(["[0.00] begin"]);
      expect(watch.active).toBe(true);
    });

    it("should bracket work with start and end times", () => {
      const { watch, clock, output } = createWatch();
      watch.reportBegin("go");
      clock.advance(2);
      watch.reportEnd("end");

      expect(output.lines).toEqual([
        "START TIME: 2024-03-05 14:07:09",
        "[0:00:00.00] go",
        "[0:00:02.00] end",
        "END TIME:   2024-03-05 14:07:09",
      ]);
    });

    it("should prefix messages with the local time", () => {
      const { watch, output } = createWatch();
      watch.reportNow("checkpoint {}", { values: [1], format: "%H:%M:%S" });

      expect(output.lines).toEqual(["[14:07:09] checkpoint 1"]);
    });
  });
});
