import { z } from 'zod';
import { BaseTool } from '../base/tool.js';
import { runAnalyses } from '../../analysis/analysisRunner.js';
import { formatDataFile } from '../../output/dataFiles.js';
import { renderPlot } from '../../output/mermaidPlots.js';
import { PlotKind } from '../../types/hdr.js';
import { MCPToolOutput, MCPToolSchema } from '../../types.js';
import { NoStabilityDataError } from '../../utils/guards/errors.js';

export const CurveArgsSchema = {
  filename: z.string().min(1).describe('Path of the HdrHistogram interval log'),
  metric: z.string().describe('Metric tag to analyse (see hdrMetricsList); empty for untagged logs'),
  maxPercentile: z.number().gt(0).max(100).optional().describe('Percentile at which the curve stops (default: 97.5)'),
  plotPoints: z.number().int().positive().optional().describe('Number of points on the curve (default: 500)'),
  raw: z.boolean().optional().describe('Keep raw histogram units instead of milliseconds'),
  format: z.enum(['json', 'mermaid', 'dat']).optional().describe('Output format: json curves, a Mermaid chart, or tab-separated rows (default: json)')
};

export type CurveArgs = MCPToolSchema<typeof CurveArgsSchema>;

/**
 * Shared implementation of the curve tools: one analysis kind over one metric
 */
export abstract class CurveTool extends BaseTool<typeof CurveArgsSchema> {
  protected abstract readonly kind: PlotKind;

  protected getSchema() {
    return CurveArgsSchema;
  }

  protected async executeImpl(args: CurveArgs): Promise<MCPToolOutput> {
    const defaults = this.context.config.analysis;
    const repository = this.context.loadRepository(args.filename);
    const result = runAnalyses(repository, {
      metric: args.metric,
      kinds: [this.kind],
      maxPercentile: args.maxPercentile ?? defaults.maxPercentile,
      plotPoints: args.plotPoints ?? defaults.plotPoints,
      raw: args.raw ?? defaults.raw,
      significantFigures: defaults.significantFigures
    });

    const curves = result.curves[this.kind];
    if (!curves) {
      throw new NoStabilityDataError(result.sliceCount, args.metric);
    }

    switch (args.format ?? 'json') {
      case 'mermaid':
        return this.formatTextOutput(renderPlot(this.kind, curves, result.bucketWidth, args.metric, result.unitName));
      case 'dat':
        return this.formatTextOutput(formatDataFile(this.kind, curves));
      case 'json':
        return this.formatJsonOutput({
          metric: result.metric,
          kind: this.kind,
          unit: result.unitName,
          bucketWidth: result.bucketWidth,
          maxValue: result.maxValue,
          totalCount: result.totalCount,
          sliceCount: result.sliceCount,
          curves,
          warnings: result.warnings
        });
    }
  }
}
