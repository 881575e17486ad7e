/**
 * Capturing line sink for printed reports.
 */

export interface OutputRecorder {
  /** Pass as the stopwatch `output` option */
  readonly write: (line: string) => void;
  /** Lines written so far, oldest first */
  readonly lines: readonly string[];
  clear(): void;
}

export function createOutputRecorder(): OutputRecorder {
  const lines: string[] = [];
  return {
    write: (line: string) => {
      lines.push(line);
    },
    get lines() {
      return [...lines];
    },
    clear: () => {
      lines.length = 0;
    },
  };
}
