import { HdrHistogram } from '../histogram/index.js';
import { Curve, PlotKind } from '../types/hdr.js';
import { NoStabilityDataError } from '../utils/guards/errors.js';
import { logger } from '../utils/logger.js';
import { DistributionExtractor } from './distributionExtractor.js';
import { DEFAULT_SIGNIFICANT_FIGURES, HistogramAggregator } from './histogramAggregator.js';
import { SliceRepository } from './sliceRepository.js';
import { UnitName, unitName } from './unitConverter.js';

export const DEFAULT_MAX_PERCENTILE = 97.5;
export const DEFAULT_PLOT_POINTS = 500;

export interface AnalysisRequest {
  metric: string;
  kinds: readonly PlotKind[];
  maxPercentile?: number;
  plotPoints?: number;
  raw?: boolean;
  significantFigures?: number;
}

export interface AnalysisResult {
  metric: string;
  unitName: UnitName;
  /** Bucket width in display units, shared by every curve */
  bucketWidth: number;
  /** Value at maxPercentile, in display units */
  maxValue: number;
  totalCount: number;
  sliceCount: number;
  curves: Partial<Record<PlotKind, Curve[]>>;
  warnings: string[];
}

/**
 * Run the requested analyses on one metric.
 *
 * The bucket width is the value at `maxPercentile` split into `plotPoints`
 * steps. A stability request on fewer than two slices becomes a warning and
 * the other analyses still run.
 */
export function runAnalyses(repository: SliceRepository, request: AnalysisRequest): AnalysisResult {
  const {
    metric,
    kinds,
    maxPercentile = DEFAULT_MAX_PERCENTILE,
    plotPoints = DEFAULT_PLOT_POINTS,
    raw = false,
    significantFigures = DEFAULT_SIGNIFICANT_FIGURES
  } = request;

  const series = repository.series(metric);
  const aggregated: HdrHistogram = HistogramAggregator.aggregate(series, significantFigures);
  const maxValue = DistributionExtractor.valueAtPercentile(aggregated, maxPercentile, raw);
  const bucketWidth = maxValue / plotPoints;

  logger.info('[AnalysisRunner] Running analyses', { metric, kinds, maxPercentile, plotPoints, raw, bucketWidth });

  const curves: Partial<Record<PlotKind, Curve[]>> = {};
  const warnings: string[] = [];

  const densityCurve = (): Curve => {
    const existing = curves.baseplot?.[0];
    return existing ?? DistributionExtractor.density(aggregated, bucketWidth, maxPercentile, raw);
  };

  if (kinds.includes('baseplot')) {
    curves.baseplot = [densityCurve()];
  }

  if (kinds.includes('stability')) {
    try {
      curves.stability = DistributionExtractor.stabilityCurves(series, bucketWidth, maxPercentile, raw);
    } catch (error) {
      if (!(error instanceof NoStabilityDataError)) {
        throw error;
      }
      logger.warn('[AnalysisRunner] Skipping stability analysis', { metric, sliceCount: error.sliceCount });
      warnings.push(`Nothing to plot for stability analysis: ${error.message}`);
    }
  }

  if (kinds.includes('percentiles')) {
    curves.percentiles = [DistributionExtractor.percentileCurve(densityCurve(), bucketWidth)];
  }

  return {
    metric,
    unitName: unitName(raw),
    bucketWidth,
    maxValue,
    totalCount: aggregated.totalCount,
    sliceCount: series.length,
    curves,
    warnings
  };
}
