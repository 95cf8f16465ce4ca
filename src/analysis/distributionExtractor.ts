import { linearSteps, ReadonlyHdrHistogram } from '../histogram/index.js';
import { Curve, MetricSeries } from '../types/hdr.js';
import { NoStabilityDataError } from '../utils/guards/errors.js';
import { UnitConverter } from './unitConverter.js';

/**
 * Derives normalized distribution curves from histograms
 */
export class DistributionExtractor {
  /**
   * Probability density of a histogram, integrating to 1 over its domain.
   *
   * The histogram is walked in linear steps of `bucketWidthDisplay` (converted
   * to raw units). Each step at or below `maxPercentile` yields its midpoint
   * as x and `count / (totalCount * bucketWidthDisplay)` as y.
   */
  static density(
    histogram: ReadonlyHdrHistogram,
    bucketWidthDisplay: number,
    maxPercentile: number,
    raw: boolean
  ): Curve {
    const curve: Curve = { xs: [], ys: [] };
    const totalCount = histogram.totalCount;
    if (totalCount === 0) {
      return curve;
    }

    const converter = new UnitConverter(raw);
    for (const step of linearSteps(histogram, converter.toRaw(bucketWidthDisplay))) {
      if (step.percentile > maxPercentile) {
        continue;
      }
      curve.xs.push(converter.toDisplay(0.5 * (step.valueIteratedFrom + step.valueIteratedTo)));
      curve.ys.push(step.countAddedInThisStep / (totalCount * bucketWidthDisplay));
    }
    return curve;
  }

  /**
   * Running percentile of a density curve, paired with the density's value axis:
   * xs are percentiles (0-100), ys the original values.
   */
  static percentileCurve(densityCurve: Curve, bucketWidthDisplay: number): Curve {
    const xs: number[] = [];
    let runningTotal = 0;
    for (const y of densityCurve.ys) {
      runningTotal += y;
      xs.push(runningTotal * bucketWidthDisplay * 100);
    }
    return { xs, ys: [...densityCurve.xs] };
  }

  /**
   * One density curve per slice, all sharing the x-axis of the longest one.
   *
   * Shorter curves are right-padded with zeros. The padding assumes every
   * curve's xs are a prefix of the longest one; grids that diverge earlier
   * end up misaligned without notice.
   *
   * @throws NoStabilityDataError for fewer than two slices
   */
  static stabilityCurves(
    series: MetricSeries,
    bucketWidthDisplay: number,
    maxPercentile: number,
    raw: boolean
  ): Curve[] {
    if (series.length < 2) {
      throw new NoStabilityDataError(series.length, series[0]?.tag);
    }

    const perSlice = series.map(slice =>
      DistributionExtractor.density(slice.histogram, bucketWidthDisplay, maxPercentile, raw)
    );
    const fullXs = perSlice.reduce(
      (longest, curve) => (curve.xs.length > longest.length ? curve.xs : longest),
      perSlice[0].xs
    );

    return perSlice.map(curve => ({
      xs: [...fullXs],
      ys: [...curve.ys, ...new Array<number>(Math.max(fullXs.length - curve.ys.length, 0)).fill(0)]
    }));
  }

  /**
   * Value reached at `percentile`, in display units unless `raw`
   */
  static valueAtPercentile(histogram: ReadonlyHdrHistogram, percentile: number, raw: boolean): number {
    return new UnitConverter(raw).toDisplay(histogram.getValueAtPercentile(percentile));
  }
}
