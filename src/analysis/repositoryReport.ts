import { IntervalHistogram } from '../types/hdr.js';
import { formatFixed, formatInteger } from '../utils/numberFormat.js';
import {
  SliceRepository,
  seriesCountNonEmpty,
  seriesEndTimestamp,
  seriesMaxValue,
  seriesMinValue,
  seriesStartTimestamp,
  seriesValueCount,
  sliceMaxValue,
  sliceMinValue
} from './sliceRepository.js';
import { unitName } from './unitConverter.js';

export interface MetricListing {
  index: number;
  tag: string;
  nonEmptySlices: number;
  valueCount: number;
  coveredMs: number;
}

/**
 * `YYYY-MM-DD HH:MM:SS.ffffff`, in UTC
 */
export function formatTimestamp(timestampMs: number): string {
  const date = new Date(timestampMs);
  const pad = (value: number, length: number = 2): string => String(value).padStart(length, '0');
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${day} ${time}.${pad(date.getUTCMilliseconds() * 1000, 6)}`;
}

/**
 * Per-tag summary used to pick a metric, in sorted tag order
 */
export function listMetrics(repository: SliceRepository): MetricListing[] {
  return repository.entries().map(([tag, series], index) => ({
    index,
    tag,
    nonEmptySlices: seriesCountNonEmpty(series),
    valueCount: seriesValueCount(series),
    coveredMs: seriesEndTimestamp(series) - seriesStartTimestamp(series)
  }));
}

export function formatMetricListing(listing: readonly MetricListing[]): string[] {
  return listing.map(
    metric =>
      `  (${formatInteger(metric.index, 2)}) ${`"${metric.tag}"`.padStart(52)} ` +
      `(${formatInteger(metric.nonEmptySlices, 2)} non-empty slices, ` +
      `${formatInteger(metric.valueCount, 9)} values, covers ${formatInteger(metric.coveredMs, 6)} ms)`
  );
}

function formatSlice(slice: IntervalHistogram, index: number, t0: number, raw: boolean): string {
  const unit = unitName(raw);
  const range =
    slice.totalCount > 0
      ? `, ranging ${formatFixed(sliceMinValue(slice, raw), 2, 8)} to ${formatFixed(sliceMaxValue(slice, raw), 2, 8)} ${unit}`
      : '';
  return (
    `        (${formatInteger(index, 3)}) ${formatInteger(slice.totalCount, 12)} vals, ` +
    `t = ${formatInteger(slice.startTimeMs - t0, 6)} to ${formatInteger(slice.endTimeMs - t0, 6)} ` +
    `(${formatInteger(slice.endTimeMs - slice.startTimeMs, 6)} ms)${range}`
  );
}

/**
 * Detailed breakdown of a log: time span, then per tag and per slice counts and ranges.
 * Times below the header are relative to the log start.
 */
export function inspectLines(repository: SliceRepository, filename: string, raw: boolean): string[] {
  const all = repository.allSlices();
  const t0 = seriesStartTimestamp(all);
  const t1 = seriesEndTimestamp(all);
  const unit = unitName(raw);

  const lines = [
    `HDR log details for "${filename}"`,
    `  Start time: ${formatTimestamp(t0)}`,
    `  End time:   ${formatTimestamp(t1)}`,
    `  Time interval covered: ${formatInteger(t1 - t0)} ms`,
    '    (time refs below are relative to "Start time")',
    `  Tags (${repository.tags().length} total):`
  ];

  for (const [tag, series] of repository.entries()) {
    lines.push(`    Tag "${tag}", ${series.length} slices.`);
    const tagT0 = seriesStartTimestamp(series);
    const tagT1 = seriesEndTimestamp(series);
    const valueCount = seriesValueCount(series);
    if (valueCount > 0) {
      lines.push(
        `      Values: ${valueCount} (ranging ${formatFixed(seriesMinValue(series, raw), 2)} ` +
          `to ${formatFixed(seriesMaxValue(series, raw), 2)} ${unit})`
      );
    } else {
      lines.push('      Values: 0');
    }
    lines.push(
      `      Time interval: ${formatInteger(tagT0 - t0, 6)} to ${formatInteger(tagT1 - t0, 6)} ` +
        `(${formatInteger(tagT1 - tagT0, 6)} ms total)`
    );
    lines.push('      Slices:');
    series.forEach((slice, index) => lines.push(formatSlice(slice, index, t0, raw)));
  }
  return lines;
}
