/**
 * Lazy iteration helpers used by the loop timers.
 */

/**
 * Split an iterable into consecutive arrays of `size` items; the last
 * chunk may be shorter. Items are pulled one chunk at a time.
 */
export function* chunk<T>(iterable: Iterable<T>, size: number): Generator<T[], void, undefined> {
  let current: T[] = [];
  for (const item of iterable) {
    current.push(item);
    if (current.length === size) {
      yield current;
      current = [];
    }
  }
  if (current.length > 0) {
    yield current;
  }
}

/** 0, 1, 2, ... without end */
export function* infiniteCount(start = 0): Generator<number, void, undefined> {
  for (let n = start; ; n++) {
    yield n;
  }
}

/** Item count when it is known without consuming the iterable */
export function knownSize(iterable: Iterable<unknown>): number | undefined {
  // Strings iterate by code point, not by UTF-16 unit
  if (typeof iterable === "string") return [...iterable].length;
  if (Array.isArray(iterable)) return iterable.length;
  if (iterable instanceof Set || iterable instanceof Map) return iterable.size;
  return undefined;
}
