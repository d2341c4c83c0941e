// ============================================================================
// Response Helpers
// ============================================================================
// Standardized response formatting for tool handlers.
// ============================================================================

import { isToolError } from '../../awx/index.js';
import type { ToolResult } from '../types.js';

/**
 * Create a successful tool response. An empty AWX body (204) is reported
 * as { success: true }.
 */
export function toolSuccess(data: unknown): ToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(data ?? { success: true }, null, 2),
    }],
  };
}

/**
 * Create an error tool response
 */
export function toolError(error: string, extra?: Record<string, unknown>): ToolResult {
  const payload: Record<string, unknown> = {
    success: false,
    error,
    ...extra,
  };
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(payload, null, 2),
    }],
    isError: true,
  };
}

/**
 * Convert anything thrown by an endpoint function into an error response.
 * ToolErrors keep their kind, status code and details.
 */
export function toolErrorFrom(err: unknown): ToolResult {
  if (isToolError(err)) {
    const { message, ...rest } = err.toJSON();
    return toolError(message, rest);
  }
  return toolError(err instanceof Error ? err.message : String(err));
}
