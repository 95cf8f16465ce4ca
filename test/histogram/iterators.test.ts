import { describe, it, expect } from 'vitest';
import { HistogramIterationStep, linearSteps, ReadonlyHdrHistogram } from '../../src/histogram/index.js';
import { makeHistogram } from '../helpers/slices.js';

function stepsOf(histogram: ReadonlyHdrHistogram, width: number): HistogramIterationStep[] {
  return [...linearSteps(histogram, width)];
}

describe('LinearIterator', () => {
  const histogram = makeHistogram([1, 1, 3, 6], 10000);

  it('reports one step per bucket up to the last count', () => {
    const steps = stepsOf(histogram, 2);

    expect(steps.map(step => step.valueIteratedTo)).toEqual([1, 3, 5, 7]);
    expect(steps.map(step => step.valueIteratedFrom)).toEqual([0, 1, 3, 5]);
    expect(steps.map(step => step.countAddedInThisStep)).toEqual([2, 1, 0, 1]);
    expect(steps.map(step => step.totalCountToThisValue)).toEqual([2, 3, 3, 4]);
    expect(steps.map(step => step.percentile)).toEqual([50, 75, 75, 100]);
  });

  it('restarts on every iteration', () => {
    const steps = linearSteps(histogram, 2);

    expect([...steps]).toHaveLength(4);
    expect([...steps]).toHaveLength(4);
  });

  it('emits nothing for an empty histogram', () => {
    expect(stepsOf(makeHistogram([]), 2)).toEqual([]);
  });

  it('walks across coarse sub-buckets', () => {
    const steps = stepsOf(makeHistogram([500_000, 1_500_000]), 1_000_000);

    expect(steps.map(step => step.valueIteratedTo)).toEqual([999_999, 1_999_999]);
    expect(steps.map(step => step.countAddedInThisStep)).toEqual([1, 1]);
    expect(steps.map(step => step.percentile)).toEqual([50, 100]);
  });

  describe('widths below one raw unit', () => {
    const steps = stepsOf(makeHistogram([1, 2, 3], 10000), 0.5);

    it('never reports a negative level', () => {
      expect(steps.map(step => step.valueIteratedTo)).toEqual([0, 0, 1, 1, 2, 2, 3]);
      expect(steps.map(step => step.valueIteratedFrom)).toEqual([0, 0, 0, 1, 1, 2, 2]);
    });

    it('gives each value its own half-unit bucket', () => {
      expect(steps.map(step => step.countAddedInThisStep)).toEqual([0, 0, 1, 0, 1, 0, 1]);
      expect(steps.map(step => step.totalCountToThisValue)).toEqual([0, 0, 1, 1, 2, 2, 3]);
    });
  });

  it('rejects non-positive widths', () => {
    expect(() => linearSteps(histogram, 0)).toThrow(RangeError);
    expect(() => linearSteps(histogram, -1)).toThrow(RangeError);
  });
});
