// ============================================================================
// Hosts Endpoints
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

export const ListHostsSchema = z.object({
  ...listParams,
  inventory_id: resourceId.optional(),
});

export const HostIdSchema = z.object({
  host_id: resourceId,
});

export const CreateHostSchema = z.object({
  name: z.string().min(1),
  inventory_id: resourceId,
  description: z.string().optional(),
  variables: jsonText.optional(),
  enabled: z.boolean().optional(),
});

export const UpdateHostSchema = z.object({
  host_id: resourceId,
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  variables: jsonText.optional(),
  enabled: z.boolean().optional(),
}).refine(v => hasAnyOf(v, ['name', 'description', 'variables', 'enabled']), {
  message: 'Provide at least one of name, description, variables, enabled',
});

export type ListHostsInput = z.input<typeof ListHostsSchema>;
export type HostIdInput = z.input<typeof HostIdSchema>;
export type CreateHostInput = z.input<typeof CreateHostSchema>;
export type UpdateHostInput = z.input<typeof UpdateHostSchema>;

/**
 * GET /api/v2/hosts/, or /api/v2/inventories/{id}/hosts/ when an inventory
 * is given.
 */
export async function listHosts(executor: RequestExecutor, input: ListHostsInput = {}): Promise<ListResult> {
  const params = parseInput(ListHostsSchema, input);
  const path = params.inventory_id !== undefined
    ? `/api/v2/inventories/${params.inventory_id}/hosts/`
    : '/api/v2/hosts/';
  return listEndpoint(executor, path, params);
}

/**
 * GET /api/v2/hosts/{id}/
 */
export async function getHost(executor: RequestExecutor, input: HostIdInput): Promise<ResponseBody> {
  const { host_id } = parseInput(HostIdSchema, input);
  return callEndpoint(executor, { method: 'GET', path: `/api/v2/hosts/${host_id}/` });
}

/**
 * POST /api/v2/hosts/
 */
export async function createHost(executor: RequestExecutor, input: CreateHostInput): Promise<ResponseBody> {
  const params = parseInput(CreateHostSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: '/api/v2/hosts/',
    body: compactBody({
      name: params.name,
      inventory: params.inventory_id,
      description: params.description ?? '',
      variables: params.variables,
      enabled: params.enabled,
    }),
  });
}

/**
 * PATCH /api/v2/hosts/{id}/
 */
export async function updateHost(executor: RequestExecutor, input: UpdateHostInput): Promise<ResponseBody> {
  const { host_id, ...fields } = parseInput(UpdateHostSchema, input);
  return callEndpoint(executor, {
    method: 'PATCH',
    path: `/api/v2/hosts/${host_id}/`,
    body: compactBody(fields),
  });
}

export async function deleteHost(executor: RequestExecutor, input: HostIdInput): Promise<ResponseBody> {
  const { host_id } = parseInput(HostIdSchema, input);
  return callEndpoint(executor, { method: 'DELETE', path: `/api/v2/hosts/${host_id}/` });
}
