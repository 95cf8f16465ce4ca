import { createHistogram, HdrHistogram, minValueOf } from '../../src/histogram/index.js';
import { IntervalHistogram } from '../../src/types/hdr.js';

/** One hour in nanoseconds, the usual range of a latency recorder */
export const RECORDER_HIGHEST = 3_600_000_000_000;

export function makeHistogram(values: readonly number[], highest: number = RECORDER_HIGHEST): HdrHistogram {
  const histogram = createHistogram(1, highest, 3);
  for (const value of values) {
    histogram.recordValue(value);
  }
  return histogram;
}

export function makeSlice(
  tag: string,
  startTimeMs: number,
  values: readonly number[],
  lengthMs: number = 1000
): IntervalHistogram {
  const histogram = makeHistogram(values);
  return {
    tag,
    startTimeMs,
    endTimeMs: startTimeMs + lengthMs,
    totalCount: histogram.totalCount,
    minValueRaw: minValueOf(histogram),
    maxValueRaw: histogram.maxValue,
    histogram
  };
}

/** 100 values spread over 1..1000 */
export const SLICE_A_VALUES = Array.from({ length: 100 }, (_, i) => Math.round(1 + (i * 999) / 99));

/** 50 values spread over 1..500 */
export const SLICE_B_VALUES = Array.from({ length: 50 }, (_, i) => Math.round(1 + (i * 499) / 49));
