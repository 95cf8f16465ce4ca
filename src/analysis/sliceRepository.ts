import { HistogramLogReader } from '../adapters/hdrlog/index.js';
import { IntervalHistogram, MetricSeries } from '../types/hdr.js';
import { EmptySeriesError, UnknownMetricError } from '../utils/guards/errors.js';
import { logger } from '../utils/logger.js';
import { UnitConverter } from './unitConverter.js';

/**
 * Decoded interval histograms grouped by metric tag, each group sorted by start time.
 * Built once, read-only afterwards.
 */
export class SliceRepository {
  private readonly byTag: ReadonlyMap<string, MetricSeries>;

  private constructor(byTag: Map<string, MetricSeries>) {
    this.byTag = byTag;
  }

  /**
   * Load every interval of a log file. A malformed record aborts the load with LogFormatError.
   */
  static load(path: string): SliceRepository {
    const repository = SliceRepository.fromSlices(HistogramLogReader.fromFile(path).readAll());
    logger.info('[SliceRepository] Loaded log', {
      path,
      tags: repository.tags().length,
      slices: repository.allSlices().length
    });
    return repository;
  }

  static fromLogText(text: string, source?: string): SliceRepository {
    return SliceRepository.fromSlices(new HistogramLogReader(text, source).readAll());
  }

  /**
   * Group slices by tag, keeping file order within a group, then sort each
   * group by start time. Array.prototype.sort is stable so ties stay in file order.
   */
  static fromSlices(slices: Iterable<IntervalHistogram>): SliceRepository {
    const groups = new Map<string, IntervalHistogram[]>();
    for (const slice of slices) {
      const group = groups.get(slice.tag);
      if (group) {
        group.push(slice);
      } else {
        groups.set(slice.tag, [slice]);
      }
    }

    const byTag = new Map<string, MetricSeries>();
    for (const [tag, group] of groups) {
      byTag.set(tag, [...group].sort((a, b) => a.startTimeMs - b.startTimeMs));
    }
    return new SliceRepository(byTag);
  }

  /** Tags present in the log, sorted */
  tags(): string[] {
    return [...this.byTag.keys()].sort();
  }

  has(tag: string): boolean {
    return this.byTag.has(tag);
  }

  series(tag: string): MetricSeries {
    const series = this.byTag.get(tag);
    if (!series) {
      throw new UnknownMetricError(tag, this.tags());
    }
    return series;
  }

  /** Mapping from tag to series, in sorted tag order */
  entries(): Array<[string, MetricSeries]> {
    return this.tags().map(tag => [tag, this.series(tag)]);
  }

  allSlices(): IntervalHistogram[] {
    return [...this.byTag.values()].flat();
  }

  isEmpty(): boolean {
    return this.byTag.size === 0;
  }
}

function requireSlices(series: MetricSeries, what: string): void {
  if (series.length === 0) {
    throw new EmptySeriesError(`Cannot compute ${what} of an empty series`);
  }
}

function nonEmpty(series: MetricSeries, what: string): MetricSeries {
  const slices = series.filter(slice => slice.totalCount > 0);
  if (slices.length === 0) {
    throw new EmptySeriesError(`Cannot compute ${what}: no slice has samples`, series[0]?.tag);
  }
  return slices;
}

export function seriesStartTimestamp(series: MetricSeries): number {
  requireSlices(series, 'start timestamp');
  return series.reduce((earliest, slice) => Math.min(earliest, slice.startTimeMs), Infinity);
}

export function seriesEndTimestamp(series: MetricSeries): number {
  requireSlices(series, 'end timestamp');
  return series.reduce((latest, slice) => Math.max(latest, slice.endTimeMs), -Infinity);
}

/**
 * Smallest sample over the non-empty slices, in display units unless `raw`
 */
export function seriesMinValue(series: MetricSeries, raw: boolean): number {
  const converter = new UnitConverter(raw);
  return nonEmpty(series, 'min value').reduce(
    (smallest, slice) => Math.min(smallest, converter.toDisplay(slice.minValueRaw)),
    Infinity
  );
}

export function seriesMaxValue(series: MetricSeries, raw: boolean): number {
  const converter = new UnitConverter(raw);
  return nonEmpty(series, 'max value').reduce(
    (largest, slice) => Math.max(largest, converter.toDisplay(slice.maxValueRaw)),
    -Infinity
  );
}

export function sliceMinValue(slice: IntervalHistogram, raw: boolean): number {
  return new UnitConverter(raw).toDisplay(slice.minValueRaw);
}

export function sliceMaxValue(slice: IntervalHistogram, raw: boolean): number {
  return new UnitConverter(raw).toDisplay(slice.maxValueRaw);
}

export function seriesCountNonEmpty(series: MetricSeries): number {
  return series.reduce((count, slice) => count + (slice.totalCount > 0 ? 1 : 0), 0);
}

export function seriesValueCount(series: MetricSeries): number {
  return series.reduce((sum, slice) => sum + slice.totalCount, 0);
}
