// ============================================================================
// Tool Kernel: single source of truth for tool dispatch
// ============================================================================
// The kernel owns: tool registry, facade registry, instance resolution,
// group scoping, dispatch and dispatch events. The MCP transport only talks
// to the kernel.
// ============================================================================

import { EventEmitter } from 'events';
import { allTools, groupOf } from './tools/index.js';
import { toolError } from './tools/shared/index.js';
import { log, type ToolExposure } from './config.js';
import type { RequestExecutor } from './awx/index.js';
import type { ToolSpec, ToolResult } from './tools/types.js';
import type { FacadeSpec, McpToolDefinition } from './facades/types.js';
import { allFacadeDefinitions, buildMcpDefinitions, validateFacades } from './facades/index.js';
import { isRecord } from './awx/index.js';

// ============================================================================
// Dispatch Context
// ============================================================================

/**
 * Optional context threaded through every dispatch call.
 */
export interface DispatchContext {
  /** Who is calling (e.g. "ops-agent", "anonymous") */
  agentId?: string;
  /** Request correlation ID, threaded through events */
  requestId?: string;
  /** AWX instance to use when the arguments name none */
  instance?: string;
  /** Restrict dispatch to these groups (undefined = all allowed) */
  allowedFacades?: string[];
}

// ============================================================================
// Dispatch Events
// ============================================================================

export interface DispatchEvent {
  type: 'dispatch' | 'result' | 'error';
  facade?: string;
  action?: string;
  tool?: string;
  instance?: string;
  agentId: string;
  requestId?: string;
  timestamp: string;
  duration_ms?: number;
  success?: boolean;
  error?: string;
}

/** Single call in a batch request */
export interface BatchCall {
  facade: string;
  action: string;
  params?: Record<string, unknown>;
}

/** Result of a single call within a batch */
export interface BatchResult {
  facade: string;
  action: string;
  result?: ToolResult;
  error?: string;
  duration_ms: number;
}

export interface KernelOptions {
  /** One executor per configured AWX instance, keyed by instance name */
  instances: Map<string, RequestExecutor>;
  defaultInstance: string;
  /** What tools/list advertises (default: tools) */
  exposure?: ToolExposure;
  /** Groups this process serves (undefined = all) */
  allowedGroups?: string[];
}

export interface ToolKernel {
  /** All tool definitions this kernel serves */
  tools: ToolSpec[];
  /** Fast lookup by tool name */
  toolMap: Map<string, ToolSpec>;
  facades: FacadeSpec[];
  facadeMap: Map<string, FacadeSpec>;
  /** Names of the configured AWX instances */
  instanceNames: string[];
  defaultInstance: string;

  /**
   * Dispatch a tool call. Handles:
   * - Facade calls: name="roles", args={ action: "grant_user", role_id: 4, user_id: 9 }
   * - Direct calls: name="roles_grant_user", args={ role_id: 4, user_id: 9 }
   * - Legacy nested: name="roles", args={ action: "grant_user", params: {...} }
   */
  dispatch(name: string, args: Record<string, unknown>, context?: DispatchContext): Promise<ToolResult>;

  /**
   * Dispatch multiple independent calls in parallel. Returns results in same order.
   * Errors are per-call; one failure doesn't abort others.
   */
  batch(calls: BatchCall[], context?: DispatchContext): Promise<BatchResult[]>;

  /** MCP tool definitions for the tools/list response */
  getMcpToolDefinitions(): McpToolDefinition[];

  /** Subscribe to dispatch events (dispatch, result, error) */
  on(event: DispatchEvent['type'], listener: (evt: DispatchEvent) => void): void;

  toolCount: number;
  facadeCount: number;
}

interface ResolvedCall {
  tool: ToolSpec;
  params: Record<string, unknown>;
  facade?: string;
  action?: string;
}

/**
 * Create the tool kernel. Call once at startup.
 */
export function createKernel(options: KernelOptions): ToolKernel {
  const { instances, defaultInstance, exposure = 'tools' } = options;

  if (!instances.has(defaultInstance)) {
    throw new Error(
      `Default instance "${defaultInstance}" has no executor. Known instances: ${[...instances.keys()].join(', ') || '(none)'}`
    );
  }

  const allowedGroups = options.allowedGroups;
  const inScope = (group: string) => !allowedGroups || allowedGroups.includes(group);

  if (allowedGroups) {
    const known = new Set(allFacadeDefinitions.map(f => f.name));
    const unknown = allowedGroups.filter(g => !known.has(g));
    if (unknown.length > 0) {
      log(`Kernel WARNING: unknown group(s) in allowlist: ${unknown.join(', ')}`);
    }
  }

  const tools = allTools.filter(t => inScope(groupOf(t.definition.name)));
  const toolMap = new Map(tools.map(t => [t.definition.name, t]));

  const facades = allFacadeDefinitions.filter(f => inScope(f.name));
  const facadeMap = new Map(facades.map(f => [f.name, f]));

  // Validate all facade actions point to real tools
  const missing = validateFacades(facades, toolMap);
  if (missing.length > 0) {
    log(`Kernel WARNING: ${missing.length} facade action(s) reference missing tools:`);
    for (const m of missing) {
      log(`  - ${m}`);
    }
  }

  const instanceNames = [...instances.keys()];
  log(`Kernel: loaded ${tools.length} tools, ${facades.length} facades, instances: ${instanceNames.join(', ')} (default: ${defaultInstance})`);

  // EventEmitter throws on .emit('error') if no listener is registered.
  const emitter = new EventEmitter();
  emitter.on('error', (evt: DispatchEvent) => {
    log(`Kernel: ${evt.tool ?? evt.facade ?? 'unknown'} threw: ${evt.error ?? ''}`);
  });

  const instanceProperty = {
    type: 'string',
    enum: instanceNames,
    description: `AWX instance to call (default: ${defaultInstance})`,
  };

  let mcpDefCache: McpToolDefinition[] | undefined;

  function getMcpToolDefinitions(): McpToolDefinition[] {
    if (!mcpDefCache) {
      const defs = exposure === 'facades'
        ? buildMcpDefinitions(facades, toolMap)
        : tools.map(t => t.definition);
      mcpDefCache = defs.map(def => ({
        ...def,
        inputSchema: {
          ...def.inputSchema,
          properties: { ...def.inputSchema.properties, instance: instanceProperty },
        },
      }));
    }
    return mcpDefCache;
  }

  /**
   * Map a facade or direct call onto one tool. Returns an error result when
   * the name, action or tool cannot be resolved.
   */
  function resolveCall(name: string, args: Record<string, unknown>): ResolvedCall | ToolResult {
    const facade = facadeMap.get(name);
    if (!facade) {
      const tool = toolMap.get(name);
      if (!tool) {
        return toolError(`Unknown tool: ${name}`);
      }
      return { tool, params: args };
    }

    const action = args.action;
    if (typeof action !== 'string' || action === '') {
      return toolError(`Missing "action" parameter for ${name}`, {
        available_actions: Object.keys(facade.actions),
      });
    }

    const internalName = Object.hasOwn(facade.actions, action) ? facade.actions[action] : undefined;
    if (!internalName) {
      return toolError(`Unknown action "${action}" for ${name}`, {
        available_actions: Object.keys(facade.actions),
      });
    }

    const tool = toolMap.get(internalName);
    if (!tool) {
      return toolError(`Internal tool "${internalName}" not found (facade: ${name}, action: ${action})`);
    }

    // Flat params: action-specific fields are at root level.
    // Also merge args.params if present (batch API, legacy callers).
    const { action: _action, params: legacyParams, ...flatParams } = args;
    const params = { ...(isRecord(legacyParams) ? legacyParams : {}), ...flatParams };

    return { tool, params, facade: name, action };
  }

  async function dispatch(
    name: string,
    args: Record<string, unknown>,
    context?: DispatchContext
  ): Promise<ToolResult> {
    const agentId = context?.agentId || 'anonymous';
    const requestId = context?.requestId;
    const group = groupOf(name);

    // Scoping: reject groups this process does not serve, then groups the
    // caller is not allowed to use
    if (!inScope(group)) {
      return toolError(`Group "${group}" is not enabled on this server`, {
        allowed_groups: allowedGroups,
      });
    }
    const allowed = context?.allowedFacades;
    if (allowed && !allowed.includes(group)) {
      return toolError(`Facade "${group}" not in allowed scope`, {
        allowed_facades: allowed,
      });
    }

    const resolved = resolveCall(name, args);
    if (!('tool' in resolved)) {
      return resolved;
    }
    const { tool, facade, action } = resolved;
    const { instance: requestedInstance, ...params } = resolved.params;

    // Instance: explicit argument, then context, then the default
    const instance = typeof requestedInstance === 'string' && requestedInstance !== ''
      ? requestedInstance
      : context?.instance || defaultInstance;
    const executor = instances.get(instance);
    if (!executor) {
      return toolError(`Unknown AWX instance "${instance}"`, {
        known_instances: instanceNames,
      });
    }

    const toolName = tool.definition.name;
    log(`Kernel: ${facade ? `facade ${facade}.${action} → ` : 'dispatch '}${toolName} on ${instance} (agent=${agentId})`);

    const base = { facade, action, tool: toolName, instance, agentId, requestId };
    const startTime = Date.now();
    emitter.emit('dispatch', {
      type: 'dispatch', ...base, timestamp: new Date().toISOString(),
    } satisfies DispatchEvent);

    try {
      const result = await tool.handler(params, { executor, instance });
      emitter.emit('result', {
        type: 'result', ...base, timestamp: new Date().toISOString(),
        duration_ms: Date.now() - startTime, success: !result.isError,
      } satisfies DispatchEvent);
      return result;
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      emitter.emit('error', {
        type: 'error', ...base, timestamp: new Date().toISOString(),
        duration_ms: Date.now() - startTime,
        error: errMsg,
      } satisfies DispatchEvent);
      return toolError(errMsg, { tool: toolName, ...(facade ? { facade, action } : {}) });
    }
  }

  async function batch(calls: BatchCall[], context?: DispatchContext): Promise<BatchResult[]> {
    log(`Kernel: batch dispatch, ${calls.length} calls (agent=${context?.agentId || 'anonymous'})`);

    const promises = calls.map(async (call): Promise<BatchResult> => {
      const start = Date.now();
      try {
        const result = await dispatch(
          call.facade,
          { action: call.action, ...(call.params || {}) },
          context
        );
        return {
          facade: call.facade,
          action: call.action,
          result,
          duration_ms: Date.now() - start,
        };
      } catch (err) {
        return {
          facade: call.facade,
          action: call.action,
          error: err instanceof Error ? err.message : String(err),
          duration_ms: Date.now() - start,
        };
      }
    });

    return Promise.all(promises);
  }

  return {
    tools,
    toolMap,
    facades,
    facadeMap,
    instanceNames,
    defaultInstance,
    dispatch,
    batch,
    on: (event, listener) => { emitter.on(event, listener); },
    getMcpToolDefinitions,
    toolCount: tools.length,
    facadeCount: facades.length,
  };
}
