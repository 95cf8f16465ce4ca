import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { globalToolRegistry, ToolRegistry } from './base/registry.js';
import { ToolCategory, ToolContext } from './base/tool.js';
import { logger } from '../utils/logger.js';
import { MCPToolOutput } from '../types.js';

import * as DiscoveryTools from './discovery/index.js';
import * as AnalysisTools from './analysis/index.js';

/**
 * Register all tools with the global registry
 */
export function registerAllToolClasses(registry: ToolRegistry = globalToolRegistry): void {
  logger.info('Registering tool classes');

  // Discovery tools
  registry.register(DiscoveryTools.HdrLogInspectTool);
  registry.register(DiscoveryTools.HdrMetricsListTool);

  // Analysis tools
  registry.register(AnalysisTools.HdrDistributionCurveTool);
  registry.register(AnalysisTools.HdrPercentileCurveTool);
  registry.register(AnalysisTools.HdrStabilityCurvesTool);

  const toolsByCategory = registry.getToolsByCategories();
  logger.info('Tool registration complete', {
    discovery: toolsByCategory.discovery.length,
    analysis: toolsByCategory.analysis.length
  });
}

const ListToolsArgsSchema = {
  category: z.enum(['discovery', 'analysis', 'all']).optional().describe('Filter tools by category')
};

/**
 * Tool list, optionally restricted to one category
 */
export function listTools(registry: ToolRegistry, category?: ToolCategory | 'all'): MCPToolOutput {
  const toolsByCategory = registry.getToolsByCategories();
  const payload =
    category && category !== 'all' ? { category, tools: toolsByCategory[category] } : toolsByCategory;
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(payload, null, 2)
    }]
  };
}

function toCategory(value: string | undefined): ToolCategory | 'all' | undefined {
  return Object.values(ToolCategory).find(category => category === value) ?? (value === 'all' ? 'all' : undefined);
}

/**
 * Register tools with MCP server
 */
export function registerToolsWithMCPServer(
  server: McpServer,
  context: ToolContext,
  registry: ToolRegistry = globalToolRegistry
): void {
  if (registry.getAllToolNames().length === 0) {
    registerAllToolClasses(registry);
  }

  const tools = registry.createTools(context);
  logger.info(`Registering ${tools.size} tools with MCP server`);

  for (const [name, tool] of tools) {
    const metadata = tool.getMetadata();
    server.tool(name, metadata.description, tool.getParameterSchema(), async args => tool.execute(args));
  }

  server.tool(
    'listTools',
    'List the available tools, optionally for one category',
    ListToolsArgsSchema,
    async args => listTools(registry, toCategory(args.category))
  );
}
