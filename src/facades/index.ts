// ============================================================================
// Facade Registry: public API for the facade system
// ============================================================================

export type { FacadeSpec, McpToolDefinition } from './types.js';
export { allFacadeDefinitions } from './definitions.js';

import type { FacadeSpec, McpToolDefinition } from './types.js';
import type { ToolSpec } from '../tools/types.js';
import { isRecord } from '../awx/index.js';

/** Properties every tool accepts implicitly; left out of signatures */
const IMPLICIT_PARAMS = new Set(['instance']);

/**
 * Build a compact signature string for one action from its tool schema.
 * Example: "grant_user(role_id, user_id)"
 */
export function buildActionSignature(actionName: string, tool: ToolSpec): string {
  const schema = tool.definition.inputSchema;
  const required = new Set(schema.required || []);
  const parts: string[] = [];

  for (const [name, prop] of Object.entries(schema.properties)) {
    if (IMPLICIT_PARAMS.has(name)) continue;

    let sig = name;
    if (isRecord(prop) && Array.isArray(prop.enum)) {
      sig += ': ' + prop.enum.map(v => (v === '' ? '""' : String(v))).join('|');
    }
    if (!required.has(name)) sig += '?';

    parts.push(sig);
  }

  return `${actionName}(${parts.join(', ')})`;
}

/**
 * Description with per-action parameter signatures.
 */
function buildSignatureDescription(
  facade: FacadeSpec,
  toolMap: Map<string, ToolSpec>
): string {
  const lines: string[] = [facade.description, 'Actions:'];

  for (const [actionName, internalName] of Object.entries(facade.actions)) {
    const tool = toolMap.get(internalName);
    lines.push(tool ? `- ${buildActionSignature(actionName, tool)}` : `- ${actionName}()`);
  }

  return lines.join('\n');
}

/**
 * Build MCP tool definitions from facade specs.
 * Each facade becomes one MCP tool with an `action` enum + flat params.
 */
export function buildMcpDefinitions(
  facades: FacadeSpec[],
  toolMap?: Map<string, ToolSpec>
): McpToolDefinition[] {
  return facades.map(f => ({
    name: f.name,
    description: toolMap ? buildSignatureDescription(f, toolMap) : f.description,
    inputSchema: {
      type: 'object' as const,
      properties: {
        action: {
          type: 'string',
          enum: Object.keys(f.actions),
          description: 'The operation to perform',
        },
      },
      required: ['action'],
      additionalProperties: true,
    },
  }));
}

/**
 * Validate that all facade action mappings point to tools that exist
 * in the kernel's tool map. Returns array of missing tool names.
 */
export function validateFacades(
  facades: FacadeSpec[],
  toolMap: Map<string, unknown>
): string[] {
  const missing: string[] = [];
  for (const f of facades) {
    for (const [action, internalName] of Object.entries(f.actions)) {
      if (!toolMap.has(internalName)) {
        missing.push(`${f.name}.${action} → ${internalName}`);
      }
    }
  }
  return missing;
}
