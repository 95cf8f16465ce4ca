import { build, Float64Histogram } from 'hdr-histogram-js';
import type { Histogram } from 'hdr-histogram-js';
import { HdrAnalysisError } from '../utils/guards/errors.js';

/**
 * Histogram implementation used across the pipeline: plain JS, with counts
 * held in a Float64Array so totals above 2^32 stay exact.
 */
export type HdrHistogram = Float64Histogram;

/**
 * Read-only view of a histogram, as consumed by the curve extraction
 */
export type ReadonlyHdrHistogram = Pick<
  HdrHistogram,
  | 'totalCount'
  | 'maxValue'
  | 'minNonZeroValue'
  | 'countsArrayLength'
  | 'getCountAtIndex'
  | 'valueFromIndex'
  | 'lowestEquivalentValue'
  | 'highestEquivalentValue'
  | 'getValueAtPercentile'
>;

/** Bucket size handed to the library wherever it allocates counts */
export const BIT_BUCKET_SIZE = 64;

const SIGNIFICANT_DIGITS = [1, 2, 3, 4, 5] as const;

type SignificantDigits = (typeof SIGNIFICANT_DIGITS)[number];

function toSignificantDigits(significantFigures: number): SignificantDigits {
  const digits = SIGNIFICANT_DIGITS.find(candidate => candidate === significantFigures);
  if (digits === undefined) {
    throw new RangeError(`significantFigures must be an integer in [1, 5], got ${significantFigures}`);
  }
  return digits;
}

/**
 * Narrow a histogram handed out by the library to the implementation
 * built with {@link BIT_BUCKET_SIZE}.
 */
export function asHdrHistogram(histogram: Histogram): HdrHistogram {
  if (histogram instanceof Float64Histogram) {
    return histogram;
  }
  throw new HdrAnalysisError('Histogram does not use 64-bit counts', 'LOG_FORMAT');
}

/**
 * Fresh fixed-range histogram over `[lowest, highest]`
 */
export function createHistogram(lowest: number, highest: number, significantFigures: number): HdrHistogram {
  if (!Number.isInteger(lowest) || lowest < 1) {
    throw new RangeError(`lowest must be an integer >= 1, got ${lowest}`);
  }
  if (highest < 2 * lowest) {
    throw new RangeError(`highest must be >= 2 * lowest, got ${highest}`);
  }
  return asHdrHistogram(
    build({
      bitBucketSize: BIT_BUCKET_SIZE,
      autoResize: false,
      lowestDiscernibleValue: lowest,
      highestTrackableValue: highest,
      numberOfSignificantValueDigits: toSignificantDigits(significantFigures)
    })
  );
}

/**
 * Smallest non-zero recorded value, 0 when there is none
 */
export function minValueOf(histogram: ReadonlyHdrHistogram): number {
  return histogram.totalCount === 0 || histogram.minNonZeroValue >= Number.MAX_SAFE_INTEGER
    ? 0
    : histogram.minNonZeroValue;
}
