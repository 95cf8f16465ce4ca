import type { ReadonlyHdrHistogram } from './hdrHistogram.js';

/**
 * One step of a histogram iteration
 */
export interface HistogramIterationStep {
  valueIteratedFrom: number;
  valueIteratedTo: number;
  countAddedInThisStep: number;
  totalCountToThisValue: number;
  /** Cumulative percentile reached at the end of the step */
  percentile: number;
}

/**
 * Walks the counts of a histogram in steps of `valueUnitsPerBucket`.
 *
 * Step `k` covers the values below `k * width`, so its reporting level is the
 * largest integer under that bound (`k * width - 1` for integer widths). A
 * step is emitted once the walk reaches the lowest equivalent value of its
 * level, so levels that fall inside one coarse sub-bucket, or widths below
 * one raw unit, each get their own (possibly empty) step.
 */
export class LinearIterator implements IterableIterator<HistogramIterationStep> {
  private readonly totalCount: number;
  private readonly countsLength: number;
  private currentIndex = 0;
  private valueAtIndex = 0;
  private valueAtNextIndex: number;
  private freshSubBucket = true;
  private totalCountToCurrentIndex = 0;
  private totalCountToPrevIndex = 0;
  private prevValueIteratedTo = 0;
  private stepNumber = 1;
  private nextValueReportingLevel: number;
  private nextValueReportingLevelLowestEquivalent: number;

  constructor(
    private readonly histogram: ReadonlyHdrHistogram,
    private readonly valueUnitsPerBucket: number
  ) {
    this.totalCount = histogram.totalCount;
    this.countsLength = histogram.countsArrayLength;
    this.valueAtNextIndex = histogram.valueFromIndex(1);
    this.nextValueReportingLevel = this.reportingLevel();
    this.nextValueReportingLevelLowestEquivalent = histogram.lowestEquivalentValue(this.nextValueReportingLevel);
  }

  [Symbol.iterator](): IterableIterator<HistogramIterationStep> {
    return this;
  }

  private reportingLevel(): number {
    return Math.max(Math.ceil(this.stepNumber * this.valueUnitsPerBucket) - 1, 0);
  }

  private hasNext(): boolean {
    if (this.totalCountToCurrentIndex < this.totalCount) {
      return true;
    }
    // Counts are exhausted; keep going only while the next level stays in this sub-bucket
    return this.nextValueReportingLevel + 1 < this.valueAtNextIndex;
  }

  private reachedIterationLevel(): boolean {
    return (
      this.valueAtIndex >= this.nextValueReportingLevelLowestEquivalent || this.currentIndex >= this.countsLength - 1
    );
  }

  private incrementIterationLevel(): void {
    this.stepNumber++;
    this.nextValueReportingLevel = this.reportingLevel();
    this.nextValueReportingLevelLowestEquivalent = this.histogram.lowestEquivalentValue(this.nextValueReportingLevel);
  }

  private incrementSubBucket(): void {
    this.freshSubBucket = true;
    this.currentIndex++;
    this.valueAtIndex = this.histogram.valueFromIndex(this.currentIndex);
    this.valueAtNextIndex = this.histogram.valueFromIndex(this.currentIndex + 1);
  }

  next(): IteratorResult<HistogramIterationStep> {
    if (!this.hasNext()) {
      return { done: true, value: undefined };
    }

    while (this.currentIndex < this.countsLength) {
      if (this.freshSubBucket) {
        this.totalCountToCurrentIndex += this.histogram.getCountAtIndex(this.currentIndex);
        this.freshSubBucket = false;
      }

      if (this.reachedIterationLevel()) {
        const valueIteratedTo = this.nextValueReportingLevel;
        const step: HistogramIterationStep = {
          valueIteratedFrom: this.prevValueIteratedTo,
          valueIteratedTo,
          countAddedInThisStep: this.totalCountToCurrentIndex - this.totalCountToPrevIndex,
          totalCountToThisValue: this.totalCountToCurrentIndex,
          percentile: this.totalCount > 0 ? (100 * this.totalCountToCurrentIndex) / this.totalCount : 0
        };
        this.prevValueIteratedTo = valueIteratedTo;
        this.totalCountToPrevIndex = this.totalCountToCurrentIndex;
        this.incrementIterationLevel();
        return { done: false, value: step };
      }

      this.incrementSubBucket();
    }

    return { done: true, value: undefined };
  }
}

/**
 * Linear steps of `valueUnitsPerBucket` raw units over a histogram
 *
 * @throws RangeError when the width is not positive
 */
export function linearSteps(
  histogram: ReadonlyHdrHistogram,
  valueUnitsPerBucket: number
): Iterable<HistogramIterationStep> {
  if (!(valueUnitsPerBucket > 0)) {
    throw new RangeError(`valueUnitsPerBucket must be positive, got ${valueUnitsPerBucket}`);
  }
  return {
    [Symbol.iterator]: () => new LinearIterator(histogram, valueUnitsPerBucket)
  };
}
