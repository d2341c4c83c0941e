// ============================================================================
// Users Endpoints
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

export const ListUsersSchema = z.object(listParams);

export const UserIdSchema = z.object({
  user_id: resourceId,
});

export const UserRolesSchema = z.object({
  user_id: resourceId,
  ...listParams,
});

export type UserIdInput = z.input<typeof UserIdSchema>;
export type UserRolesInput = z.input<typeof UserRolesSchema>;

/**
 * GET /api/v2/users/
 */
export async function listUsers(executor: RequestExecutor, input: ListInput = {}): Promise<ListResult> {
  const params = parseInput(ListUsersSchema, input);
  return listEndpoint(executor, '/api/v2/users/', params);
}

/**
 * GET /api/v2/users/{id}/
 */
export async function getUser(executor: RequestExecutor, input: UserIdInput): Promise<ResponseBody> {
  const { user_id } = parseInput(UserIdSchema, input);
  return callEndpoint(executor, { method: 'GET', path: `/api/v2/users/${user_id}/` });
}

/**
 * Roles granted to a user, directly or through teams.
 * GET /api/v2/users/{id}/roles/
 */
export async function listUserRoles(executor: RequestExecutor, input: UserRolesInput): Promise<ListResult> {
  const params = parseInput(UserRolesSchema, input);
  return listEndpoint(executor, `/api/v2/users/${params.user_id}/roles/`, params);
}
