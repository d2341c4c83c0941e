// ============================================================================
// Organizations Endpoints
// ============================================================================

import { z } from 'zod';
import type { RequestExecutor, ResponseBody } from '../awx/index.js';
import {
  callEndpoint,
  listEndpoint,
  listParams,
  parseInput,
  resourceId,
  type ListInput,
  type ListResult,
} from './shared/index.js';

export const ListOrganizationsSchema = z.object(listParams);

export const OrganizationIdSchema = z.object({
  organization_id: resourceId,
});

export const CreateOrganizationSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
});

export type OrganizationIdInput = z.input<typeof OrganizationIdSchema>;
export type CreateOrganizationInput = z.input<typeof CreateOrganizationSchema>;

export async function listOrganizations(executor: RequestExecutor, input: ListInput = {}): Promise<ListResult> {
  const params = parseInput(ListOrganizationsSchema, input);
  return listEndpoint(executor, '/api/v2/organizations/', params);
}

export async function getOrganization(executor: RequestExecutor, input: OrganizationIdInput): Promise<ResponseBody> {
  const { organization_id } = parseInput(OrganizationIdSchema, input);
  return callEndpoint(executor, { method: 'GET', path: `/api/v2/organizations/${organization_id}/` });
}

export async function createOrganization(executor: RequestExecutor, input: CreateOrganizationInput): Promise<ResponseBody> {
  const { name, description } = parseInput(CreateOrganizationSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: '/api/v2/organizations/',
    body: { name, description: description ?? '' },
  });
}
