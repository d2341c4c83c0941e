// ============================================================================
// Stdio Transport
// ============================================================================
// MCP clients spawn the server as a child process and talk over
// stdin/stdout. Session = process lifetime.
// ============================================================================

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import { createMcpServer } from './mcp.js';

/**
 * Connect a kernel-backed MCP server to stdio. The transport is only
 * replaced in tests. Close the returned server to stop serving.
 */
export async function startStdioServer(
  kernel: ToolKernel,
  transport: Transport = new StdioServerTransport()
): Promise<Server> {
  const server = createMcpServer(kernel);
  await server.connect(transport);
  log(`AWX tools MCP server running on stdio (${kernel.toolCount} tools, default instance: ${kernel.defaultInstance})`);
  return server;
}
