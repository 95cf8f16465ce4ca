import type { HdrHistogram } from '../histogram/index.js';
import { UnknownPlotKindError } from '../utils/guards/errors.js';

/**
 * One time-windowed histogram for one metric tag, as decoded from a log line
 */
export interface IntervalHistogram {
  /** Metric tag, empty when the log line carries none */
  readonly tag: string;
  readonly startTimeMs: number;
  readonly endTimeMs: number;
  readonly totalCount: number;
  /** Raw units; meaningless when totalCount is 0 */
  readonly minValueRaw: number;
  readonly maxValueRaw: number;
  readonly histogram: HdrHistogram;
}

/**
 * Slices sharing one tag, ascending by start time
 */
export type MetricSeries = readonly IntervalHistogram[];

export interface Curve {
  xs: number[];
  ys: number[];
}

export const PLOT_KINDS = ['baseplot', 'percentiles', 'stability'] as const;

export type PlotKind = (typeof PLOT_KINDS)[number];

export function parsePlotKind(kind: string): PlotKind {
  const match = PLOT_KINDS.find(candidate => candidate === kind);
  if (match === undefined) {
    throw new UnknownPlotKindError(kind);
  }
  return match;
}
