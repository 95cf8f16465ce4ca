/**
 * Error codes surfaced by the histogram engine
 */
export type HdrErrorCode =
  | 'LOG_FORMAT'
  | 'EMPTY_SERIES'
  | 'NO_STABILITY_DATA'
  | 'UNKNOWN_PLOT_KIND'
  | 'UNKNOWN_METRIC'
  | 'CONFIGURATION';

/**
 * Base class for every error raised by the analysis pipeline
 */
export class HdrAnalysisError extends Error {
  constructor(message: string, public readonly code: HdrErrorCode, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'HdrAnalysisError';
  }
}

/**
 * The input log cannot be decoded. Aborts the whole load.
 */
export class LogFormatError extends HdrAnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LOG_FORMAT', details);
    this.name = 'LogFormatError';
  }
}

/**
 * A series has no samples where a min/max/aggregate needs at least one
 */
export class EmptySeriesError extends HdrAnalysisError {
  constructor(message: string, public readonly tag?: string) {
    super(message, 'EMPTY_SERIES', tag !== undefined ? { tag } : undefined);
    this.name = 'EmptySeriesError';
  }
}

/**
 * Stability analysis needs at least two slices
 */
export class NoStabilityDataError extends HdrAnalysisError {
  constructor(public readonly sliceCount: number, public readonly tag?: string) {
    super(`Stability analysis needs at least 2 slices, got ${sliceCount}`, 'NO_STABILITY_DATA', { sliceCount, tag });
    this.name = 'NoStabilityDataError';
  }
}

export class UnknownPlotKindError extends HdrAnalysisError {
  constructor(public readonly kind: string) {
    super(`Unknown plot kind "${kind}"`, 'UNKNOWN_PLOT_KIND', { kind });
    this.name = 'UnknownPlotKindError';
  }
}

export class UnknownMetricError extends HdrAnalysisError {
  constructor(public readonly tag: string, public readonly available: string[]) {
    super(`Metric "${tag}" not found in log`, 'UNKNOWN_METRIC', { tag, available });
    this.name = 'UnknownMetricError';
  }
}

export class ConfigurationError extends HdrAnalysisError {
  constructor(message: string, public readonly problems: string[] = []) {
    super(message, 'CONFIGURATION', { problems });
    this.name = 'ConfigurationError';
  }
}
