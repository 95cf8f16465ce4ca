import { CurveTool } from './curveTool.js';
import { ToolCategory, ToolContext, ToolMetadata } from '../base/tool.js';

export class HdrDistributionCurveTool extends CurveTool {
  static readonly metadata: ToolMetadata = {
    name: 'hdrDistributionCurve',
    category: ToolCategory.ANALYSIS,
    description: 'Probability density of a metric, normalized to integrate to 1, up to a percentile cutoff'
  };

  protected readonly kind = 'baseplot';

  constructor(context: ToolContext) {
    super(context, HdrDistributionCurveTool.metadata);
  }
}
