/**
 * Library entry point: histograms, log reader, analyses and output
 */

export * from './histogram/index.js';
export * from './adapters/hdrlog/index.js';
export * from './analysis/index.js';
export * from './output/index.js';
export { PLOT_KINDS, parsePlotKind } from './types/hdr.js';
export type { IntervalHistogram, MetricSeries, Curve, PlotKind } from './types/hdr.js';
export {
  HdrAnalysisError,
  LogFormatError,
  EmptySeriesError,
  NoStabilityDataError,
  UnknownPlotKindError,
  UnknownMetricError,
  ConfigurationError,
  ErrorResponseFormatter
} from './utils/guards/index.js';
export type { HdrErrorCode } from './utils/guards/index.js';
export { ConfigLoader, defaultConfig } from './config/index.js';
export type { Config, ConfigOverrides } from './config/index.js';
export { runCli } from './cli/main.js';
export type { CliDependencies, CliIO } from './cli/main.js';
export type { MetricSelector } from './cli/metricSelector.js';
