// ============================================================================
// Inventories Endpoints
// ============================================================================

import { z } from 'zod';
import type { RequestExecutor, ResponseBody } from '../awx/index.js';
import {
  callEndpoint,
  compactBody,
  hasAnyOf,
  jsonText,
  listEndpoint,
  listParams,
  parseInput,
  resourceId,
  type ListResult,
} from './shared/index.js';

export const ListInventoriesSchema = z.object({
  ...listParams,
  organization_id: resourceId.optional(),
});

export const InventoryIdSchema = z.object({
  inventory_id: resourceId,
});

export const CreateInventorySchema = z.object({
  name: z.string().min(1),
  organization_id: resourceId,
  description: z.string().optional(),
  variables: jsonText.optional(),
});

export const UpdateInventorySchema = z.object({
  inventory_id: resourceId,
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  variables: jsonText.optional(),
}).refine(v => hasAnyOf(v, ['name', 'description', 'variables']), {
  message: 'Provide at least one of name, description, variables',
});

export type ListInventoriesInput = z.input<typeof ListInventoriesSchema>;
export type InventoryIdInput = z.input<typeof InventoryIdSchema>;
export type CreateInventoryInput = z.input<typeof CreateInventorySchema>;
export type UpdateInventoryInput = z.input<typeof UpdateInventorySchema>;

/**
 * GET /api/v2/inventories/
 */
export async function listInventories(executor: RequestExecutor, input: ListInventoriesInput = {}): Promise<ListResult> {
  const params = parseInput(ListInventoriesSchema, input);
  return listEndpoint(executor, '/api/v2/inventories/', params, {
    organization: params.organization_id,
  });
}

/**
 * GET /api/v2/inventories/{id}/
 */
export async function getInventory(executor: RequestExecutor, input: InventoryIdInput): Promise<ResponseBody> {
  const { inventory_id } = parseInput(InventoryIdSchema, input);
  return callEndpoint(executor, { method: 'GET', path: `/api/v2/inventories/${inventory_id}/` });
}

/**
 * POST /api/v2/inventories/
 */
export async function createInventory(executor: RequestExecutor, input: CreateInventoryInput): Promise<ResponseBody> {
  const params = parseInput(CreateInventorySchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: '/api/v2/inventories/',
    body: compactBody({
      name: params.name,
      organization: params.organization_id,
      description: params.description ?? '',
      variables: params.variables,
    }),
  });
}

/**
 * PATCH /api/v2/inventories/{id}/ with only the given fields.
 */
export async function updateInventory(executor: RequestExecutor, input: UpdateInventoryInput): Promise<ResponseBody> {
  const { inventory_id, ...fields } = parseInput(UpdateInventorySchema, input);
  return callEndpoint(executor, {
    method: 'PATCH',
    path: `/api/v2/inventories/${inventory_id}/`,
    body: compactBody(fields),
  });
}

/**
 * DELETE /api/v2/inventories/{id}/. AWX deletes inventories asynchronously
 * and answers 202 or 204.
 */
export async function deleteInventory(executor: RequestExecutor, input: InventoryIdInput): Promise<ResponseBody> {
  const { inventory_id } = parseInput(InventoryIdSchema, input);
  return callEndpoint(executor, { method: 'DELETE', path: `/api/v2/inventories/${inventory_id}/` });
}
