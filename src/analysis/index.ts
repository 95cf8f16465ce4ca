export {
  SliceRepository,
  seriesStartTimestamp,
  seriesEndTimestamp,
  seriesMinValue,
  seriesMaxValue,
  sliceMinValue,
  sliceMaxValue,
  seriesCountNonEmpty,
  seriesValueCount
} from './sliceRepository.js';
export { UnitConverter, VALUE_FACTOR, toDisplay, toRaw, unitName } from './unitConverter.js';
export type { UnitName } from './unitConverter.js';
export { HistogramAggregator, DEFAULT_SIGNIFICANT_FIGURES } from './histogramAggregator.js';
export { DistributionExtractor } from './distributionExtractor.js';
export { runAnalyses, DEFAULT_MAX_PERCENTILE, DEFAULT_PLOT_POINTS } from './analysisRunner.js';
export type { AnalysisRequest, AnalysisResult } from './analysisRunner.js';
export { listMetrics, formatMetricListing, inspectLines, formatTimestamp } from './repositoryReport.js';
export type { MetricListing } from './repositoryReport.js';
