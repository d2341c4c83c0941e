// ============================================================================
// Hosts Domain Tools
// ============================================================================

import type { ToolSpec } from '../types.js';
import { endpointHandler, idProperty, LIST_PROPERTIES } from '../shared/index.js';
import {
  CreateHostSchema,
  HostIdSchema,
  ListHostsSchema,
  UpdateHostSchema,
  createHost,
  deleteHost,
  getHost,
  listHosts,
  updateHost,
} from '../hosts.js';

const HOST_FIELDS = {
  description: { type: 'string', description: 'Description of the host' },
  variables: {
    type: 'string',
    description: 'Host variables as a JSON string, e.g. "{\\"ansible_host\\": \\"10.0.0.5\\"}"',
  },
  enabled: { type: 'boolean', description: 'Whether the host is included in job runs' },
};

export const hostsListTool: ToolSpec = {
  definition: {
    name: 'hosts_list',
    description: 'List hosts, either all of them or those in one inventory. (GET /api/v2/hosts/ or GET /api/v2/inventories/{id}/hosts/)',
    annotations: {
      title: 'List Hosts',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        inventory_id: idProperty('inventory to list hosts from'),
        ...LIST_PROPERTIES,
      },
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/hosts/' },
  handler: endpointHandler(ListHostsSchema, listHosts),
};

export const hostsGetTool: ToolSpec = {
  definition: {
    name: 'hosts_get',
    description: 'Get details about a specific host. (GET /api/v2/hosts/{id}/)',
    annotations: {
      title: 'Get Host',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        host_id: idProperty('host'),
      },
      required: ['host_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/hosts/{id}/' },
  handler: endpointHandler(HostIdSchema, getHost),
};

export const hostsCreateTool: ToolSpec = {
  definition: {
    name: 'hosts_create',
    description: 'Add a host to an inventory. (POST /api/v2/hosts/)',
    annotations: {
      title: 'Create Host',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Hostname or IP address' },
        inventory_id: idProperty('inventory the host belongs to'),
        ...HOST_FIELDS,
      },
      required: ['name', 'inventory_id'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/hosts/' },
  handler: endpointHandler(CreateHostSchema, createHost),
};

export const hostsUpdateTool: ToolSpec = {
  definition: {
    name: 'hosts_update',
    description: 'Update a host. Only the given fields change. (PATCH /api/v2/hosts/{id}/)',
    annotations: {
      title: 'Update Host',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        host_id: idProperty('host'),
        name: { type: 'string', description: 'New hostname' },
        ...HOST_FIELDS,
      },
      required: ['host_id'],
    },
  },
  endpoint: { method: 'PATCH', path: '/api/v2/hosts/{id}/' },
  handler: endpointHandler(UpdateHostSchema, updateHost),
};

export const hostsDeleteTool: ToolSpec = {
  definition: {
    name: 'hosts_delete',
    description: 'Remove a host from its inventory. (DELETE /api/v2/hosts/{id}/)',
    annotations: {
      title: 'Delete Host',
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        host_id: idProperty('host to delete'),
      },
      required: ['host_id'],
    },
  },
  endpoint: { method: 'DELETE', path: '/api/v2/hosts/{id}/' },
  handler: endpointHandler(HostIdSchema, deleteHost),
};

export const hostsTools: ToolSpec[] = [
  hostsListTool,
  hostsGetTool,
  hostsCreateTool,
  hostsUpdateTool,
  hostsDeleteTool,
];
