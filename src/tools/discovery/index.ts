/**
 * Discovery tools for log exploration
 */

export { HdrLogInspectTool } from './hdrLogInspect.js';
export { HdrMetricsListTool } from './hdrMetricsList.js';
