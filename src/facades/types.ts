// ============================================================================
// Facade Types
// ============================================================================
// A facade collapses one endpoint group into a single MCP-visible tool with
// an `action` enum, so an agent sees ten tools instead of forty.
// ============================================================================

import type { ToolDefinition } from '../tools/types.js';

/**
 * Facade specification: one MCP-visible tool that dispatches to the tools
 * of a group based on the `action` parameter.
 */
export interface FacadeSpec {
  /** MCP tool name, equal to the group name (e.g. "roles", "jobs") */
  name: string;

  description: string;

  /**
   * Action name → internal tool name mapping.
   *
   * Example: { "grant_user": "roles_grant_user", "list": "roles_list" }
   */
  actions: Record<string, string>;
}

/** MCP tool definition shape, as advertised by tools/list */
export type McpToolDefinition = ToolDefinition;
