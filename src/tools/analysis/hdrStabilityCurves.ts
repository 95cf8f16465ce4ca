import { CurveTool } from './curveTool.js';
import { ToolCategory, ToolContext, ToolMetadata } from '../base/tool.js';

export class HdrStabilityCurvesTool extends CurveTool {
  static readonly metadata: ToolMetadata = {
    name: 'hdrStabilityCurves',
    category: ToolCategory.ANALYSIS,
    description: 'One density curve per time slice of a metric on a shared value axis, to spot distribution drift (needs at least 2 slices)'
  };

  protected readonly kind = 'stability';

  constructor(context: ToolContext) {
    super(context, HdrStabilityCurvesTool.metadata);
  }
}
