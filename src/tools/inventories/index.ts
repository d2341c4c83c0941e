// ============================================================================
// Inventories Domain Tools
// ============================================================================

import type { ToolSpec } from '../types.js';
import { endpointHandler, idProperty, LIST_PROPERTIES } from '../shared/index.js';
import {
  CreateInventorySchema,
  InventoryIdSchema,
  ListInventoriesSchema,
  UpdateInventorySchema,
  createInventory,
  deleteInventory,
  getInventory,
  listInventories,
  updateInventory,
} from '../inventories.js';

const VARIABLES_PROPERTY = {
  type: 'string',
  description: 'Inventory variables as a JSON string, e.g. "{\\"env\\": \\"prod\\"}"',
};

export const inventoriesListTool: ToolSpec = {
  definition: {
    name: 'inventories_list',
    description: 'List all inventories, optionally filtered by organization. (GET /api/v2/inventories/)',
    annotations: {
      title: 'List Inventories',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        ...LIST_PROPERTIES,
        organization_id: idProperty('organization to filter by'),
      },
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/inventories/' },
  handler: endpointHandler(ListInventoriesSchema, listInventories),
};

export const inventoriesGetTool: ToolSpec = {
  definition: {
    name: 'inventories_get',
    description: 'Get details about a specific inventory. (GET /api/v2/inventories/{id}/)',
    annotations: {
      title: 'Get Inventory',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        inventory_id: idProperty('inventory'),
      },
      required: ['inventory_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/inventories/{id}/' },
  handler: endpointHandler(InventoryIdSchema, getInventory),
};

export const inventoriesCreateTool: ToolSpec = {
  definition: {
    name: 'inventories_create',
    description: 'Create a new inventory in an organization. (POST /api/v2/inventories/)',
    annotations: {
      title: 'Create Inventory',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Name of the inventory' },
        organization_id: idProperty('organization that owns the inventory'),
        description: { type: 'string', description: 'Description of the inventory' },
        variables: VARIABLES_PROPERTY,
      },
      required: ['name', 'organization_id'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/inventories/' },
  handler: endpointHandler(CreateInventorySchema, createInventory),
};

export const inventoriesUpdateTool: ToolSpec = {
  definition: {
    name: 'inventories_update',
    description: 'Update the name, description or variables of an inventory. Only the given fields change. (PATCH /api/v2/inventories/{id}/)',
    annotations: {
      title: 'Update Inventory',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        inventory_id: idProperty('inventory'),
        name: { type: 'string', description: 'New name' },
        description: { type: 'string', description: 'New description' },
        variables: VARIABLES_PROPERTY,
      },
      required: ['inventory_id'],
    },
  },
  endpoint: { method: 'PATCH', path: '/api/v2/inventories/{id}/' },
  handler: endpointHandler(UpdateInventorySchema, updateInventory),
};

export const inventoriesDeleteTool: ToolSpec = {
  definition: {
    name: 'inventories_delete',
    description: 'Delete an inventory and all of its hosts and groups. (DELETE /api/v2/inventories/{id}/)',
    annotations: {
      title: 'Delete Inventory',
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        inventory_id: idProperty('inventory to delete'),
      },
      required: ['inventory_id'],
    },
  },
  endpoint: { method: 'DELETE', path: '/api/v2/inventories/{id}/' },
  handler: endpointHandler(InventoryIdSchema, deleteInventory),
};

export const inventoriesTools: ToolSpec[] = [
  inventoriesListTool,
  inventoriesGetTool,
  inventoriesCreateTool,
  inventoriesUpdateTool,
  inventoriesDeleteTool,
];
