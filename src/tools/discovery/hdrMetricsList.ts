import { z } from 'zod';
import { BaseTool, ToolCategory, ToolContext, ToolMetadata } from '../base/tool.js';
import { listMetrics } from '../../analysis/repositoryReport.js';
import { MCPToolOutput, MCPToolSchema } from '../../types.js';

const HdrMetricsListArgsSchema = {
  filename: z.string().min(1).describe('Path of the HdrHistogram interval log')
};

type HdrMetricsListArgs = MCPToolSchema<typeof HdrMetricsListArgsSchema>;

/**
 * Metric tags of a log with their slice and sample counts
 */
export class HdrMetricsListTool extends BaseTool<typeof HdrMetricsListArgsSchema> {
  static readonly schema = HdrMetricsListArgsSchema;
  static readonly metadata: ToolMetadata = {
    name: 'hdrMetricsList',
    category: ToolCategory.DISCOVERY,
    description: 'List the metric tags found in an HdrHistogram interval log, with non-empty slice count, sample count and covered time'
  };

  constructor(context: ToolContext) {
    super(context, HdrMetricsListTool.metadata);
  }

  protected getSchema() {
    return HdrMetricsListArgsSchema;
  }

  protected async executeImpl(args: HdrMetricsListArgs): Promise<MCPToolOutput> {
    const metrics = listMetrics(this.context.loadRepository(args.filename));
    return this.formatJsonOutput({
      metrics: metrics.map(({ index: _index, ...metric }) => metric),
      count: metrics.length
    });
  }
}
