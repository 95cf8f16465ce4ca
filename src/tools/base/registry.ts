import { BaseTool, ToolCategory, ToolClass, ToolContext, ToolMetadata } from './tool.js';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';

/**
 * Tool registry for managing and organizing tools
 */
export class ToolRegistry {
  private tools = new Map<string, ToolClass>();
  private toolsByCategory = new Map<ToolCategory, Set<string>>();

  constructor() {
    for (const category of Object.values(ToolCategory)) {
      this.toolsByCategory.set(category, new Set());
    }
  }

  /**
   * Register a tool class
   */
  register(toolClass: ToolClass): void {
    const metadata = toolClass.metadata;
    this.tools.set(metadata.name, toolClass);
    this.toolsByCategory.get(metadata.category)?.add(metadata.name);

    logger.debug(`Registered tool ${metadata.name} in category ${metadata.category}`);
  }

  /**
   * Register multiple tools at once
   */
  registerAll(toolClasses: readonly ToolClass[]): void {
    for (const toolClass of toolClasses) {
      this.register(toolClass);
    }
  }

  /**
   * Create tool instances sharing one context
   */
  createTools(context: ToolContext): Map<string, BaseTool<z.ZodRawShape>> {
    const instances = new Map<string, BaseTool<z.ZodRawShape>>();

    for (const [name, ToolClassCtor] of this.tools) {
      instances.set(name, new ToolClassCtor(context));
      logger.debug(`Created tool instance: ${name}`);
    }

    logger.info(`Created ${instances.size} tool instances`);
    return instances;
  }

  /**
   * Get tools by category
   */
  getToolsByCategory(category: ToolCategory): string[] {
    const categorySet = this.toolsByCategory.get(category);
    return categorySet ? Array.from(categorySet) : [];
  }

  /**
   * Get all registered tool names
   */
  getAllToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Get tool metadata
   */
  getToolMetadata(toolName: string): ToolMetadata | null {
    return this.tools.get(toolName)?.metadata ?? null;
  }

  /**
   * Get tools organized by category
   */
  getToolsByCategories(): Record<ToolCategory, ToolMetadata[]> {
    const result: Record<ToolCategory, ToolMetadata[]> = {
      [ToolCategory.DISCOVERY]: [],
      [ToolCategory.ANALYSIS]: []
    };

    for (const [category, toolNames] of this.toolsByCategory) {
      for (const toolName of toolNames) {
        const metadata = this.getToolMetadata(toolName);
        if (metadata) {
          result[category].push(metadata);
        }
      }
    }

    return result;
  }
}

// Global registry instance
export const globalToolRegistry = new ToolRegistry();
