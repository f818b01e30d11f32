/**
 * Tool Registry
 *
 * Holds the tool definitions the agent exposes and turns them into an
 * in-process MCP server for the Claude Agent SDK. The SDK addresses a
 * server's tools as `mcp__<server>__<tool>`.
 */

import { createSdkMcpServer, tool } from '@anthropic-ai/claude-agent-sdk';
import { z } from 'zod';
import type { ToolEnvelope } from '../core/types.js';
import type { StructuredLogger } from '../logging/logger.js';
import type { DataToolDefinition } from './data-tools.js';

export const DATA_SERVER_NAME = 'dataAnalysis';
export const DATA_SERVER_VERSION = '1.0.0';

const ToolDefinitionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'tool names are snake_case'),
  version: z.string().regex(/^\d+\.\d+\.\d+$/),
  description: z.string().min(10),
  gated: z.boolean(),
});

export type McpServer = ReturnType<typeof createSdkMcpServer>;

export class ToolRegistry {
  private tools: Map<string, DataToolDefinition> = new Map();

  constructor(private readonly logger: StructuredLogger) {}

  /**
   * Register a tool. Names must be unique within the registry.
   */
  register(definition: DataToolDefinition): void {
    const result = ToolDefinitionSchema.safeParse(definition);
    if (!result.success) {
      throw new Error(`Invalid tool definition for ${definition.name}: ${result.error.message}`);
    }
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool already registered: ${definition.name}`);
    }

    this.tools.set(definition.name, definition);
    this.logger.debug('tool_registered', { tool: definition.name, gated: definition.gated });
  }

  registerAll(definitions: DataToolDefinition[]): this {
    for (const definition of definitions) {
      this.register(definition);
    }
    return this;
  }

  get(name: string): DataToolDefinition | null {
    return this.tools.get(name) ?? null;
  }

  list(): DataToolDefinition[] {
    return [...this.tools.values()];
  }

  /**
   * Call a tool directly, outside the SDK.
   */
  async invoke(name: string, input: Record<string, unknown> = {}): Promise<ToolEnvelope> {
    const definition = this.get(name);
    if (!definition) {
      throw new Error(`Unknown tool: ${name}`);
    }
    return definition.execute(input);
  }

  /**
   * Names as the reasoning service sees them once served by `server`.
   */
  allowedToolNames(server: string = DATA_SERVER_NAME): string[] {
    return this.list().map(definition => `mcp__${server}__${definition.name}`);
  }

  createMcpServer(name: string = DATA_SERVER_NAME, version: string = DATA_SERVER_VERSION): McpServer {
    const tools = this.list().map(definition =>
      tool(definition.name, definition.description, definition.inputShape, args => definition.execute(args))
    );
    this.logger.info('mcp_server_created', { server: name, tools: tools.length });
    return createSdkMcpServer({ name, version, tools });
  }
}
