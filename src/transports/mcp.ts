// ============================================================================
// Shared MCP Server Factory
// ============================================================================
// Creates an MCP Server with ListTools + CallTool handlers wired to the kernel.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { log } from '../config.js';
import { isRecord } from '../awx/index.js';
import type { DispatchContext, ToolKernel } from '../kernel.js';
import { toolError } from '../tools/shared/index.js';

export const SERVER_NAME = 'awx-tools-mcp';
export const SERVER_VERSION = '0.1.0';

function metaString(meta: Record<string, unknown>, key: string): string | undefined {
  const value = meta[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Dispatch context from the request's `_meta` (agentId, requestId, instance).
 */
export function contextFromMeta(meta: unknown): DispatchContext | undefined {
  if (!isRecord(meta)) return undefined;
  return {
    agentId: metaString(meta, 'agentId'),
    requestId: metaString(meta, 'requestId'),
    instance: metaString(meta, 'instance'),
  };
}

/**
 * Create an MCP Server wired to the given kernel.
 * The MCP SDK only supports one transport per Server.
 */
export function createMcpServer(kernel: ToolKernel): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: kernel.getMcpToolDefinitions() };
  });

  // Handle tool calls by dispatching through the kernel
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    log(`Tool called: ${name}`);
    log(`Arguments:`, JSON.stringify(args, null, 2));

    try {
      return await kernel.dispatch(name, args ?? {}, contextFromMeta(request.params._meta));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      log(`Error in tool ${name}:`, errorMessage);
      return toolError(errorMessage);
    }
  });

  return server;
}
