/**
 * Deterministic clocks for stopwatch tests.
 *
 * Readings are in seconds. The clock shape is defined inline to avoid a
 * circular dependency between @lapwatch/test-utils and @lapwatch/stopwatch.
 */

/** Structural match for the stopwatch `Clock` interface */
interface ClockLike {
  now(): number;
}

/** Clock that only moves when told to */
export class FakeClock implements ClockLike {
  private current: number;
  private readCount = 0;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    this.readCount++;
    return this.current;
  }

  /** Move forward by `seconds` */
  advance(seconds: number): void {
    if (seconds < 0) {
      throw new RangeError(`FakeClock cannot move backwards (advance by ${seconds})`);
    }
    this.current += seconds;
  }

  /** Jump to an absolute reading not earlier than the current one */
  set(reading: number): void {
    if (reading < this.current) {
      throw new RangeError(`FakeClock cannot move backwards (${this.current} -> ${reading})`);
    }
    this.current = reading;
  }

  /** Number of times `now()` has been read */
  get reads(): number {
    return this.readCount;
  }
}

/**
 * Clock that advances by a fixed step after every reading:
 * start, start + step, start + 2 * step, ...
 */
export class SteppingClock implements ClockLike {
  private next: number;
  private readCount = 0;

  constructor(
    private readonly step: number,
    start = 0,
  ) {
    this.next = start;
  }

  now(): number {
    const reading = this.next;
    this.next += this.step;
    this.readCount++;
    return reading;
  }

  get reads(): number {
    return this.readCount;
  }
}
