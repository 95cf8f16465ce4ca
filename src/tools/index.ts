export { registerToolsWithMCPServer as registerAllTools, registerAllToolClasses, listTools } from './registration.js';
export { globalToolRegistry, ToolRegistry } from './base/registry.js';
export { BaseTool, ToolCategory } from './base/tool.js';
export type { ToolContext, ToolMetadata, ToolClass } from './base/tool.js';

// Export all tool classes for direct use
export * from './discovery/index.js';
export * from './analysis/index.js';
