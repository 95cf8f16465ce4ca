import { writeFileSync } from 'fs';
import { Curve, parsePlotKind } from '../types/hdr.js';
import { logger } from '../utils/logger.js';
import { formatScientific } from '../utils/numberFormat.js';

function formatPairs(curve: Curve | undefined): string[] {
  if (!curve) {
    return [];
  }
  const rows: string[] = [];
  const length = Math.min(curve.xs.length, curve.ys.length);
  for (let i = 0; i < length; i++) {
    rows.push(`${formatScientific(curve.xs[i])}\t${formatScientific(curve.ys[i])}`);
  }
  return rows;
}

/**
 * Stability curves share their xs, so they become one row per x with a column per slice
 */
function formatColumns(curves: readonly Curve[]): string[] {
  if (curves.length === 0) {
    return [];
  }
  const xs = curves[0].xs;
  const length = curves.reduce((shortest, curve) => Math.min(shortest, curve.ys.length), xs.length);
  const rows: string[] = [];
  for (let i = 0; i < length; i++) {
    const columns = curves.map(curve => formatScientific(curve.ys[i]));
    rows.push([formatScientific(xs[i]), ...columns].join('\t'));
  }
  return rows;
}

/**
 * Tab-separated rows, newline-joined without a trailing newline
 *
 * @throws UnknownPlotKindError
 */
export function formatDataFile(kind: string, curves: readonly Curve[]): string {
  switch (parsePlotKind(kind)) {
    case 'baseplot':
    case 'percentiles':
      return formatPairs(curves[0]).join('\n');
    case 'stability':
      return formatColumns(curves).join('\n');
  }
}

/**
 * Write the data file for one plot kind. Returns false when the write fails.
 *
 * @throws UnknownPlotKindError
 */
export function plotToDatafile(kind: string, curves: readonly Curve[], fileName: string): boolean {
  const content = formatDataFile(kind, curves);
  try {
    writeFileSync(fileName, content, 'utf8');
    logger.info('[DataFiles] Wrote data file', { kind, fileName, rows: content === '' ? 0 : content.split('\n').length });
    return true;
  } catch (error) {
    logger.error('[DataFiles] Failed to write data file', {
      fileName,
      error: error instanceof Error ? error.message : String(error)
    });
    return false;
  }
}
