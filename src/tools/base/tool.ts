import { z } from 'zod';
import { SliceRepository } from '../../analysis/sliceRepository.js';
import { Config } from '../../config/types.js';
import { MCPToolOutput, MCPToolSchema } from '../../types.js';
import { ErrorResponseFormatter } from '../../utils/guards/errorResponse.js';
import { logger } from '../../utils/logger.js';

/**
 * Tool category for organization
 */
export enum ToolCategory {
  DISCOVERY = 'discovery',
  ANALYSIS = 'analysis'
}

/**
 * Tool metadata interface
 */
export interface ToolMetadata {
  name: string;
  category: ToolCategory;
  description: string;
}

/**
 * What a tool needs from the server: a way to load logs and the active configuration
 */
export interface ToolContext {
  loadRepository(filename: string): SliceRepository;
  config: Config;
}

/**
 * Base class for all MCP tools with Zod schema validation
 */
export abstract class BaseTool<TSchema extends z.ZodRawShape> {
  protected readonly context: ToolContext;
  protected readonly metadata: ToolMetadata;

  constructor(context: ToolContext, metadata: ToolMetadata) {
    this.context = context;
    this.metadata = metadata;
  }

  /**
   * Get the schema for this tool
   */
  protected abstract getSchema(): TSchema;

  /**
   * Get tool metadata
   */
  getMetadata(): ToolMetadata {
    return this.metadata;
  }

  /**
   * Get the parameter schema for MCP
   */
  getParameterSchema(): TSchema {
    return this.getSchema();
  }

  /**
   * Validate the arguments and run the tool. Failures come back as an error
   * response, never as a thrown exception.
   */
  async execute(args: unknown): Promise<MCPToolOutput> {
    try {
      const schema: z.ZodObject<TSchema> = z.object(this.getSchema());
      logger.debug(`Tool ${this.metadata.name} received args:`, { args });
      const validatedArgs = schema.parse(args);

      logger.info(`Executing tool ${this.metadata.name}`, {
        category: this.metadata.category,
        args: validatedArgs
      });

      const result = await this.executeImpl(validatedArgs);

      logger.info(`Tool ${this.metadata.name} executed successfully`);
      return result;
    } catch (error) {
      if (error instanceof z.ZodError) {
        logger.error(`Zod validation error in ${this.metadata.name}`, {
          errors: error.errors,
          receivedArgs: args
        });
        return this.formatErrorOutput(
          `Validation error in ${this.metadata.name}: ${error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')}`
        );
      }

      logger.error(`Tool ${this.metadata.name} execution failed`, {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined
      });
      return ErrorResponseFormatter.formatErrorResponse(error, { tool: this.metadata.name, args });
    }
  }

  /**
   * Execute the tool implementation - must be implemented by subclasses
   */
  protected abstract executeImpl(args: MCPToolSchema<TSchema>): Promise<MCPToolOutput>;

  /**
   * Helper to format output as text
   */
  protected formatTextOutput(text: string): MCPToolOutput {
    return {
      content: [{
        type: 'text',
        text
      }]
    };
  }

  /**
   * Helper to format JSON output
   */
  protected formatJsonOutput(data: unknown, pretty = false): MCPToolOutput {
    return {
      content: [{
        type: 'text',
        text: pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data)
      }]
    };
  }

  /**
   * Helper to format error output
   */
  protected formatErrorOutput(error: Error | string): MCPToolOutput {
    return {
      content: [{
        type: 'text',
        text: `Error: ${error instanceof Error ? error.message : error}`
      }],
      isError: true
    };
  }
}

/**
 * Constructor of a concrete tool, carrying its metadata statically
 */
export interface ToolClass {
  new (context: ToolContext): BaseTool<z.ZodRawShape>;
  readonly metadata: ToolMetadata;
}
