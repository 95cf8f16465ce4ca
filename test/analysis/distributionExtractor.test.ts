import { describe, it, expect } from 'vitest';
import { DistributionExtractor, HistogramAggregator } from '../../src/analysis/index.js';
import { NoStabilityDataError } from '../../src/utils/guards/errors.js';
import { makeHistogram, makeSlice, SLICE_A_VALUES, SLICE_B_VALUES } from '../helpers/slices.js';

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

describe('DistributionExtractor', () => {
  describe('density', () => {
    const histogram = makeHistogram([1, 1, 3, 6], 10000);

    it('yields bucket midpoints and normalized counts', () => {
      const curve = DistributionExtractor.density(histogram, 2, 100, true);

      expect(curve.xs).toEqual([0.5, 2, 4, 6]);
      expect(curve.ys).toEqual([0.25, 0.125, 0, 0.125]);
    });

    it('integrates to one', () => {
      const curve = DistributionExtractor.density(histogram, 2, 100, true);

      expect(sum(curve.ys) * 2).toBe(1);
    });

    it('drops buckets beyond the percentile cap', () => {
      const curve = DistributionExtractor.density(histogram, 2, 75, true);

      expect(curve.xs).toEqual([0.5, 2, 4]);
      expect(curve.ys).toEqual([0.25, 0.125, 0]);
    });

    it('is empty for an empty histogram', () => {
      expect(DistributionExtractor.density(makeHistogram([]), 2, 100, true)).toEqual({ xs: [], ys: [] });
    });

    it('converts to display units', () => {
      const curve = DistributionExtractor.density(makeHistogram([500_000, 1_500_000]), 1, 100, false);

      expect(curve.xs).toHaveLength(2);
      expect(curve.xs[0]).toBeCloseTo(0.4999995, 12);
      expect(curve.xs[1]).toBeCloseTo(1.499999, 12);
      expect(curve.ys).toEqual([0.5, 0.5]);
    });

    it('keeps midpoints non-negative for buckets narrower than one raw unit', () => {
      const curve = DistributionExtractor.density(makeHistogram([1, 2, 3]), 0.5, 100, true);

      expect(curve.xs).toEqual([0, 0, 0.5, 1, 1.5, 2, 2.5]);
      expect(curve.ys).toEqual([0, 0, 1 / 1.5, 0, 1 / 1.5, 0, 1 / 1.5]);
      expect(sum(curve.ys) * 0.5).toBeCloseTo(1, 12);
    });

    it('rejects a zero bucket width', () => {
      expect(() => DistributionExtractor.density(histogram, 0, 100, true)).toThrow(RangeError);
    });
  });

  describe('percentileCurve', () => {
    it('accumulates the density into percentiles', () => {
      const density = DistributionExtractor.density(makeHistogram([1, 1, 3, 6], 10000), 2, 100, true);
      const curve = DistributionExtractor.percentileCurve(density, 2);

      expect(curve.xs).toEqual([50, 75, 75, 100]);
      expect(curve.ys).toEqual([0.5, 2, 4, 6]);
    });

    it('is empty for an empty density', () => {
      expect(DistributionExtractor.percentileCurve({ xs: [], ys: [] }, 1)).toEqual({ xs: [], ys: [] });
    });
  });

  describe('stabilityCurves', () => {
    const series = [makeSlice('read', 0, [1, 9]), makeSlice('read', 1000, [2, 5]), makeSlice('read', 2000, [8])];

    it('pads every slice to the longest value axis', () => {
      const curves = DistributionExtractor.stabilityCurves(series, 2, 100, true);

      expect(curves).toHaveLength(3);
      for (const curve of curves) {
        expect(curve.xs).toEqual([0.5, 2, 4, 6, 8]);
      }
      expect(curves[0].ys).toEqual([0.25, 0, 0, 0, 0.25]);
      expect(curves[1].ys).toEqual([0, 0.25, 0.25, 0, 0]);
      expect(curves[2].ys).toEqual([0, 0, 0, 0, 0.25]);
    });

    it('needs at least two slices', () => {
      expect(() => DistributionExtractor.stabilityCurves([series[0]], 2, 100, true)).toThrow(NoStabilityDataError);
      expect(() => DistributionExtractor.stabilityCurves([], 2, 100, true)).toThrow(
        'Stability analysis needs at least 2 slices, got 0'
      );
    });
  });

  describe('aggregated series', () => {
    const series = [makeSlice('read', 0, SLICE_A_VALUES), makeSlice('read', 1000, SLICE_B_VALUES)];
    const aggregated = HistogramAggregator.aggregate(series);

    it('keeps every sample', () => {
      expect(aggregated.totalCount).toBe(150);
      expect(DistributionExtractor.valueAtPercentile(aggregated, 100, true)).toBe(1000);
      expect(DistributionExtractor.valueAtPercentile(aggregated, 100, false)).toBe(0.001);
    });

    it('yields one point per display bucket', () => {
      const curve = DistributionExtractor.density(aggregated, 0.001, 100, false);

      expect(curve.xs).toHaveLength(2);
      expect(curve.xs[0]).toBeCloseTo(0.0004995, 15);
      expect(curve.xs[1]).toBeCloseTo(0.001499, 15);
      expect(curve.ys[0]).toBeCloseTo(149 / (150 * 0.001), 9);
      expect(curve.ys[1]).toBeCloseTo(1 / (150 * 0.001), 9);
      expect(sum(curve.ys) * 0.001).toBeCloseTo(1, 12);
    });

    it('yields non-decreasing percentiles ending at 100', () => {
      const density = DistributionExtractor.density(aggregated, 0.0001, 100, false);
      const curve = DistributionExtractor.percentileCurve(density, 0.0001);

      for (let i = 1; i < curve.xs.length; i++) {
        expect(curve.xs[i]).toBeGreaterThanOrEqual(curve.xs[i - 1]);
      }
      expect(curve.xs[curve.xs.length - 1]).toBeCloseTo(100, 9);
    });
  });
});
