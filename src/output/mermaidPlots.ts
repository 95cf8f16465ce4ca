import { writeFileSync } from 'fs';
import { Curve, parsePlotKind } from '../types/hdr.js';
import { logger } from '../utils/logger.js';
import { escapeMermaidString, escapeMermaidAxisLabels, truncateAndEscapeMermaid } from '../utils/mermaidEscaper.js';

export const PERCENTILE_TICKS: readonly number[] = [0, 10, 20, 30, 40, 50, 60, 70, 80, 90, 95, 100];

/**
 * Compact number for chart axes and series: six significant digits
 */
export function formatChartNumber(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(6)));
}

function chartBlock(lines: string[], directive?: string): string {
  const body = ['xychart-beta', ...lines.map(line => `    ${line}`)];
  if (directive) {
    body.unshift(directive);
  }
  return ['```mermaid', ...body, '```'].join('\n');
}

function noDataChart(title: string): string {
  return chartBlock([
    `title "${truncateAndEscapeMermaid(`No data: ${title}`, 120)}"`,
    'x-axis ["No data"]',
    'y-axis 0 --> 1',
    'bar [0]'
  ]);
}

function yAxisMax(values: readonly number[]): number {
  const max = values.reduce((current, value) => Math.max(current, value), 0);
  return max > 0 ? max : 1;
}

function xAxisRange(xs: readonly number[]): string {
  return `${formatChartNumber(xs[0])} --> ${formatChartNumber(xs[xs.length - 1])}`;
}

function seriesValues(values: readonly number[]): string {
  return `[${values.map(formatChartNumber).join(', ')}]`;
}

/**
 * Colour `index` of `count` on a blue to green ramp
 */
export function winterColor(index: number, count: number): string {
  const t = count > 1 ? index / (count - 1) : 0;
  const hex = (component: number): string => Math.round(component).toString(16).padStart(2, '0');
  return `#00${hex(255 * t)}${hex(255 * (1 - 0.5 * t))}`;
}

/**
 * Bar chart of one density curve; the title carries the weighted average Σxy / Σy
 */
function renderBaseplot(curve: Curve | undefined, bucketWidth: number, metric: string, unit: string): string {
  const title = `Distribution for "${metric}"`;
  const sumY = curve ? curve.ys.reduce((sum, y) => sum + y, 0) : 0;
  if (!curve || curve.xs.length === 0 || sumY === 0) {
    return [`# ${title}`, '', noDataChart(title), ''].join('\n');
  }

  const average = curve.xs.reduce((sum, x, i) => sum + x * curve.ys[i], 0) / sumY;
  const fullTitle = `${title} (avg = ${average.toFixed(2)} ${unit})`;
  const chart = chartBlock([
    `title "${truncateAndEscapeMermaid(fullTitle, 120)}"`,
    `x-axis "${escapeMermaidString(`t [${unit}]`)}" ${xAxisRange(curve.xs)}`,
    `y-axis "${escapeMermaidString(`p(t) [1/${unit}]`)}" 0 --> ${formatChartNumber(yAxisMax(curve.ys))}`,
    `bar ${seriesValues(curve.ys)}`
  ]);
  return [`# ${fullTitle}`, '', chart, '', `Bucket width: ${formatChartNumber(bucketWidth)} ${unit}`, ''].join('\n');
}

/**
 * One line per slice over the shared x-axis, coloured along the ramp, followed by a legend
 */
function renderStability(curves: readonly Curve[], metric: string, unit: string): string {
  const title = `Stability analysis for "${metric}"`;
  const drawn = curves
    .map((curve, index) => ({ curve, index }))
    .filter(({ curve }) => curve.xs.length > 0);
  if (drawn.length === 0) {
    return [`# ${title}`, '', noDataChart(title), ''].join('\n');
  }

  const colors = curves.map((_, index) => winterColor(index, curves.length));
  const palette = drawn.map(({ index }) => colors[index]).join(', ');
  const directive = `%%{init: {"themeVariables": {"xyChart": {"plotColorPalette": "${palette}"}}}}%%`;
  const allYs = drawn.flatMap(({ curve }) => curve.ys);

  const chart = chartBlock(
    [
      `title "${truncateAndEscapeMermaid(title, 120)}"`,
      `x-axis "${escapeMermaidString(`t [${unit}]`)}" ${xAxisRange(drawn[0].curve.xs)}`,
      `y-axis "${escapeMermaidString(`p(t) [1/${unit}]`)}" 0 --> ${formatChartNumber(yAxisMax(allYs))}`,
      ...drawn.map(({ curve }) => `line ${seriesValues(curve.ys)}`)
    ],
    directive
  );
  const legend = drawn.map(({ index }) => `- Slice ${index}: \`${colors[index]}\``);
  return [`# ${title}`, '', chart, '', ...legend, ''].join('\n');
}

/**
 * Value of the curve at each percentile tick: the first y whose x reaches the tick
 */
export function percentileTicks(curve: Curve): Array<{ percentile: number; value: number }> {
  const ticks: Array<{ percentile: number; value: number }> = [];
  for (const percentile of PERCENTILE_TICKS) {
    const index = curve.xs.findIndex(x => x >= percentile);
    if (index >= 0) {
      ticks.push({ percentile, value: curve.ys[index] });
    }
  }
  return ticks;
}

/**
 * The curve resampled at every whole percentile it reaches, so that it can be
 * drawn on an evenly spaced axis
 */
export function percentileGrid(curve: Curve): Array<{ percentile: number; value: number }> {
  const grid: Array<{ percentile: number; value: number }> = [];
  let index = 0;
  for (let percentile = 0; percentile <= 100; percentile++) {
    while (index < curve.xs.length && curve.xs[index] < percentile) {
      index++;
    }
    if (index >= curve.xs.length) {
      break;
    }
    grid.push({ percentile, value: curve.ys[index] });
  }
  return grid;
}

/**
 * Line through the whole curve, with the values at the fixed ticks as a table
 */
function renderPercentiles(curve: Curve | undefined, metric: string, unit: string): string {
  const title = `Percentiles for "${metric}"`;
  const grid = curve ? percentileGrid(curve) : [];
  const ticks = curve ? percentileTicks(curve) : [];
  if (grid.length === 0) {
    return [`# ${title}`, '', noDataChart(title), ''].join('\n');
  }

  const values = grid.map(point => point.value);
  const chart = chartBlock([
    `title "${truncateAndEscapeMermaid(title, 120)}"`,
    `x-axis "Percentile" ${grid[0].percentile} --> ${grid[grid.length - 1].percentile}`,
    `y-axis "${escapeMermaidString(`t [${unit}]`)}" 0 --> ${formatChartNumber(yAxisMax(values))}`,
    `line ${seriesValues(values)}`
  ]);
  const table = [
    `| Percentile | t [${unit}] |`,
    '|---:|---:|',
    ...ticks.map(tick => `| ${tick.percentile} | ${formatChartNumber(tick.value)} |`)
  ];
  return [`# ${title}`, '', chart, '', ...table, ''].join('\n');
}

/**
 * Markdown document holding the Mermaid chart of one plot kind
 *
 * @throws UnknownPlotKindError
 */
export function renderPlot(
  kind: string,
  curves: readonly Curve[],
  bucketWidth: number,
  metric: string,
  unit: string
): string {
  switch (parsePlotKind(kind)) {
    case 'baseplot':
      return renderBaseplot(curves[0], bucketWidth, metric, unit);
    case 'stability':
      return renderStability(curves, metric, unit);
    case 'percentiles':
      return renderPercentiles(curves[0], metric, unit);
  }
}

/**
 * Write the chart document for one plot kind. Returns false when the write fails.
 *
 * @throws UnknownPlotKindError
 */
export function plotToFigure(
  kind: string,
  curves: readonly Curve[],
  bucketWidth: number,
  metric: string,
  fileName: string,
  unit: string
): boolean {
  const document = renderPlot(kind, curves, bucketWidth, metric, unit);
  try {
    writeFileSync(fileName, document, 'utf8');
    logger.info('[MermaidPlots] Wrote chart', { kind, metric, fileName });
    return true;
  } catch (error) {
    logger.error('[MermaidPlots] Failed to write chart', {
      fileName,
      error: error instanceof Error ? error.message : String(error)
    });
    return false;
  }
}
