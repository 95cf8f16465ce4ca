import { z } from 'zod';
import { BaseTool, ToolCategory, ToolContext, ToolMetadata } from '../base/tool.js';
import { inspectLines } from '../../analysis/repositoryReport.js';
import { MCPToolOutput, MCPToolSchema } from '../../types.js';

const HdrLogInspectArgsSchema = {
  filename: z.string().min(1).describe('Path of the HdrHistogram interval log'),
  raw: z.boolean().optional().describe('Report raw histogram units instead of milliseconds (default from configuration)')
};

type HdrLogInspectArgs = MCPToolSchema<typeof HdrLogInspectArgsSchema>;

/**
 * Detailed breakdown of a log: time span, tags, and every slice's count and range
 */
export class HdrLogInspectTool extends BaseTool<typeof HdrLogInspectArgsSchema> {
  static readonly schema = HdrLogInspectArgsSchema;
  static readonly metadata: ToolMetadata = {
    name: 'hdrLogInspect',
    category: ToolCategory.DISCOVERY,
    description: 'Break down an HdrHistogram interval log: covered time span, metric tags, and per-slice sample counts and value ranges'
  };

  constructor(context: ToolContext) {
    super(context, HdrLogInspectTool.metadata);
  }

  protected getSchema() {
    return HdrLogInspectArgsSchema;
  }

  protected async executeImpl(args: HdrLogInspectArgs): Promise<MCPToolOutput> {
    const repository = this.context.loadRepository(args.filename);
    if (repository.isEmpty()) {
      return this.formatTextOutput(`No interval histograms found in "${args.filename}"`);
    }
    const raw = args.raw ?? this.context.config.analysis.raw;
    return this.formatTextOutput(inspectLines(repository, args.filename, raw).join('\n'));
  }
}
