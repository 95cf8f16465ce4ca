export {
  HdrAnalysisError,
  LogFormatError,
  EmptySeriesError,
  NoStabilityDataError,
  UnknownPlotKindError,
  UnknownMetricError,
  ConfigurationError
} from './errors.js';
export type { HdrErrorCode } from './errors.js';
export { ErrorResponseFormatter } from './errorResponse.js';
