import { createHistogram, HdrHistogram } from '../histogram/index.js';
import { MetricSeries } from '../types/hdr.js';
import { logger } from '../utils/logger.js';
import { seriesMaxValue } from './sliceRepository.js';

export const DEFAULT_SIGNIFICANT_FIGURES = 3;

/**
 * Merges the slices of a series into one histogram covering their full value range
 */
export class HistogramAggregator {
  /**
   * Build a fresh histogram over `[1, floor(maxRaw) + 1]` and add every slice into it.
   * The precision should match the one the slices were recorded with, so that
   * bucket boundaries line up.
   *
   * @throws EmptySeriesError when no slice has samples
   */
  static aggregate(series: MetricSeries, significantFigures: number = DEFAULT_SIGNIFICANT_FIGURES): HdrHistogram {
    const maxRaw = seriesMaxValue(series, true);
    // A series holding only zeros still needs a valid range
    const highest = Math.max(Math.floor(maxRaw) + 1, 2);
    const aggregated = createHistogram(1, highest, significantFigures);

    for (const slice of series) {
      aggregated.add(slice.histogram);
    }

    logger.debug('[HistogramAggregator] Aggregated series', {
      tag: series[0]?.tag,
      slices: series.length,
      totalCount: aggregated.totalCount,
      highest
    });
    return aggregated;
  }
}
