/**
 * Curve analysis tools
 */

export { CurveTool, CurveArgsSchema } from './curveTool.js';
export type { CurveArgs } from './curveTool.js';
export { HdrDistributionCurveTool } from './hdrDistributionCurve.js';
export { HdrPercentileCurveTool } from './hdrPercentileCurve.js';
export { HdrStabilityCurvesTool } from './hdrStabilityCurves.js';
