// ============================================================================
// System Domain Tools
// ============================================================================

import { HTTP_METHODS } from '../../awx/index.js';
import type { ToolSpec } from '../types.js';
import { endpointHandler, toolErrorFrom, toolSuccess } from '../shared/index.js';
import { API_PREFIX, SystemRequestSchema, getDashboard, ping, systemRequest } from '../system.js';

export const systemPingTool: ToolSpec = {
  definition: {
    name: 'system_ping',
    description: 'Check that the AWX instance is reachable and report its version and nodes. (GET /api/v2/ping/)',
    annotations: {
      title: 'Ping AWX',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/ping/' },
  handler: async (_args, ctx) => {
    try {
      return toolSuccess(await ping(ctx.executor));
    } catch (err) {
      return toolErrorFrom(err);
    }
  },
};

export const systemDashboardTool: ToolSpec = {
  definition: {
    name: 'system_dashboard',
    description: 'Get dashboard counters: hosts, inventories, projects, job status totals. (GET /api/v2/dashboard/)',
    annotations: {
      title: 'AWX Dashboard',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/dashboard/' },
  handler: async (_args, ctx) => {
    try {
      return toolSuccess(await getDashboard(ctx.executor));
    } catch (err) {
      return toolErrorFrom(err);
    }
  },
};

export const systemRequestTool: ToolSpec = {
  definition: {
    name: 'system_request',
    description: `Send one raw request to an AWX API route that no other tool covers. The path must start with ${API_PREFIX}. (ANY ${API_PREFIX}...)`,
    annotations: {
      title: 'Raw AWX Request',
      readOnlyHint: false,
      destructiveHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        method: {
          type: 'string',
          enum: [...HTTP_METHODS],
          description: 'HTTP method',
        },
        path: {
          type: 'string',
          description: 'API route, e.g. "/api/v2/teams/3/"',
        },
        query: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Query string parameters',
        },
        body: {
          type: 'object',
          description: 'JSON request body',
        },
      },
      required: ['method', 'path'],
    },
  },
  endpoint: { method: 'ANY', path: `${API_PREFIX}...` },
  handler: endpointHandler(SystemRequestSchema, systemRequest),
};

export const systemTools: ToolSpec[] = [
  systemPingTool,
  systemDashboardTool,
  systemRequestTool,
];
