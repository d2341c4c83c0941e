// ============================================================================
// Tool Types
// ============================================================================
// Shared type definitions for the endpoint tool architecture.
// ============================================================================

import type { HttpMethod, RequestExecutor } from '../awx/index.js';

// Result and definition shapes are type aliases, not interfaces, so they
// satisfy the MCP SDK's index-signature (passthrough) types.

/**
 * Standard MCP tool result format
 */
export type ToolResult = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

export type ToolAnnotations = {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
};

export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  annotations?: ToolAnnotations;
  inputSchema: ToolInputSchema;
};

/**
 * Per-call context handed to every handler by the kernel.
 */
export interface ToolContext {
  executor: RequestExecutor;
  /** Name of the AWX instance the executor talks to */
  instance: string;
}

/**
 * Tool specification combining definition, the wrapped endpoint and handler.
 * Each endpoint group exports an array of these.
 */
export interface ToolSpec {
  definition: ToolDefinition;
  /** The AWX endpoint this tool wraps (path uses {id} placeholders) */
  endpoint: {
    method: HttpMethod | 'ANY';
    path: string;
  };
  handler: (args: Record<string, unknown>, ctx: ToolContext) => Promise<ToolResult>;
}
