#!/usr/bin/env node
// MCP server exposing the histogram curve analyses over stdio
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { SliceRepository } from './analysis/sliceRepository.js';
import { ConfigLoader } from './config/index.js';
import { registerAllTools, globalToolRegistry } from './tools/index.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = ConfigLoader.load();

  const server = new McpServer({
    name: config.server.name,
    version: config.server.version
  });

  registerAllTools(server, {
    config,
    loadRepository: filename => SliceRepository.load(filename)
  });

  const toolsByCategory = globalToolRegistry.getToolsByCategories();
  logger.info('Available tools by category:', {
    discovery: toolsByCategory.discovery.map(t => t.name),
    analysis: toolsByCategory.analysis.map(t => t.name)
  });

  await server.connect(new StdioServerTransport());
  logger.info(`MCP server started with name: ${config.server.name}, version: ${config.server.version}`);
}

main().catch(err => {
  logger.error('Error during server startup:', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined
  });
  process.exit(1);
});
