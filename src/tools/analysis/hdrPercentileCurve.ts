import { CurveTool } from './curveTool.js';
import { ToolCategory, ToolContext, ToolMetadata } from '../base/tool.js';

export class HdrPercentileCurveTool extends CurveTool {
  static readonly metadata: ToolMetadata = {
    name: 'hdrPercentileCurve',
    category: ToolCategory.ANALYSIS,
    description: 'Percentile-vs-value curve of a metric (running integral of its density)'
  };

  protected readonly kind = 'percentiles';

  constructor(context: ToolContext) {
    super(context, HdrPercentileCurveTool.metadata);
  }
}
