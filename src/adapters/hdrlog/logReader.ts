import { readFileSync } from 'fs';
import { HistogramLogReader as IntervalLogReader } from 'hdr-histogram-js';
import type { Histogram } from 'hdr-histogram-js';
import { asHdrHistogram, BIT_BUCKET_SIZE, minValueOf } from '../../histogram/index.js';
import { IntervalHistogram } from '../../types/hdr.js';
import { LogFormatError } from '../../utils/guards/errors.js';
import { logger } from '../../utils/logger.js';

const START_TIME_PATTERN = /^#\[StartTime: ([\d.]+)/;
const INTERVAL_PATTERN = /^(?:Tag=[^,]*,)?\d+(?:\.\d+)?,\d+(?:\.\d+)?,\d+(?:\.\d+)?,\S+$/;
const LEGEND_PREFIX = '"StartTimestamp"';

/** Tag the library gives to lines without one */
const LIBRARY_NO_TAG = 'NO TAG';

interface IntervalLine {
  lineNumber: number;
  wellFormed: boolean;
  content: string;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sequential reader over the text of an HdrHistogram interval log.
 *
 * Decoding and the time reference (`StartTime`/`BaseTime` headers, relative
 * timestamps) are left to the hdr-histogram-js reader. Interval lines are
 * checked up front so that a malformed one is reported with its line number
 * instead of being skipped.
 */
export class HistogramLogReader {
  private readonly reader: IntervalLogReader;
  private readonly intervalLines: IntervalLine[] = [];
  private readonly startTimeSec: number | null = null;
  private position = 0;

  constructor(text: string, private readonly source: string = '<memory>') {
    const lines = text.split(/\r?\n/).map(line => line.trim());

    for (const [index, line] of lines.entries()) {
      if (line === '' || line.startsWith(LEGEND_PREFIX)) {
        continue;
      }
      if (line.startsWith('#')) {
        const startMatch = START_TIME_PATTERN.exec(line);
        if (startMatch) {
          this.startTimeSec = parseFloat(startMatch[1]);
        }
        continue;
      }
      this.intervalLines.push({ lineNumber: index + 1, wellFormed: INTERVAL_PATTERN.test(line), content: line });
    }

    this.reader = new IntervalLogReader(lines.join('\n'), BIT_BUCKET_SIZE);
  }

  static fromFile(path: string): HistogramLogReader {
    logger.debug('[HistogramLogReader] Reading log file', { path });
    return new HistogramLogReader(readFileSync(path, 'utf8'), path);
  }

  /** Seconds since epoch from the `StartTime` header, if one was seen */
  get startTime(): number | null {
    return this.startTimeSec;
  }

  /**
   * Decode the next interval histogram, or null when the log is exhausted
   */
  nextIntervalHistogram(): IntervalHistogram | null {
    const line = this.intervalLines[this.position];
    if (line === undefined) {
      return null;
    }
    if (!line.wellFormed) {
      throw new LogFormatError(`Malformed interval line ${line.lineNumber} in ${this.source}`, {
        line: line.lineNumber,
        content: line.content.slice(0, 120)
      });
    }

    const decoded = this.decodeNext(line.lineNumber);
    this.position++;
    if (decoded === null) {
      return null;
    }

    const histogram = asHdrHistogram(decoded);
    return {
      tag: histogram.tag === LIBRARY_NO_TAG ? '' : histogram.tag,
      startTimeMs: Math.round(histogram.startTimeStampMsec),
      endTimeMs: Math.round(histogram.endTimeStampMsec),
      totalCount: histogram.totalCount,
      minValueRaw: minValueOf(histogram),
      maxValueRaw: histogram.maxValue,
      histogram
    };
  }

  private decodeNext(lineNumber: number): Histogram | null {
    try {
      return this.reader.nextIntervalHistogram();
    } catch (error) {
      throw new LogFormatError(`Cannot decode histogram on line ${lineNumber} of ${this.source}: ${messageOf(error)}`, {
        line: lineNumber
      });
    }
  }

  /**
   * Decode every remaining interval, in file order
   */
  readAll(): IntervalHistogram[] {
    const intervals: IntervalHistogram[] = [];
    for (let interval = this.nextIntervalHistogram(); interval; interval = this.nextIntervalHistogram()) {
      intervals.push(interval);
    }
    return intervals;
  }
}
