// ============================================================================
// Roles Endpoints
// ============================================================================
// Thin wrappers over /api/v2/roles/. AWX roles are fixed per resource
// (admin, execute, use, read, ...); access is managed by associating users
// and teams with a role.
// ============================================================================

import { z } from 'zod';
import type { RequestExecutor, ResponseBody } from '../awx/index.js';
import {
  callEndpoint,
  listEndpoint,
  listParams,
  parseInput,
  resourceId,
  type ListResult,
} from './shared/index.js';

// ============================================================================
// Schemas
// ============================================================================

export const ListRolesSchema = z.object({
  ...listParams,
  role_field: z.string().min(1).optional(),
  content_type: z.number().int().positive().optional(),
  object_id: z.number().int().positive().optional(),
});

export const RoleIdSchema = z.object({
  role_id: resourceId,
});

export const RoleRelatedListSchema = z.object({
  role_id: resourceId,
  ...listParams,
});

export const RoleTeamSchema = z.object({
  role_id: resourceId,
  team_id: resourceId,
});

export const RoleUserSchema = z.object({
  role_id: resourceId,
  user_id: resourceId,
});

export type ListRolesInput = z.input<typeof ListRolesSchema>;
export type RoleIdInput = z.input<typeof RoleIdSchema>;
export type RoleRelatedListInput = z.input<typeof RoleRelatedListSchema>;
export type RoleTeamInput = z.input<typeof RoleTeamSchema>;
export type RoleUserInput = z.input<typeof RoleUserSchema>;

export function rolePath(roleId: number, sub?: 'children' | 'parents' | 'teams' | 'users'): string {
  return sub ? `/api/v2/roles/${roleId}/${sub}/` : `/api/v2/roles/${roleId}/`;
}

// ============================================================================
// Read
// ============================================================================

/**
 * List roles visible to the authenticated user.
 * GET /api/v2/roles/
 */
export async function listRoles(executor: RequestExecutor, input: ListRolesInput = {}): Promise<ListResult> {
  const params = parseInput(ListRolesSchema, input);
  return listEndpoint(executor, '/api/v2/roles/', params, {
    role_field: params.role_field,
    content_type: params.content_type,
    object_id: params.object_id,
  });
}

/**
 * GET /api/v2/roles/{id}/
 */
export async function getRole(executor: RequestExecutor, input: RoleIdInput): Promise<ResponseBody> {
  const { role_id } = parseInput(RoleIdSchema, input);
  return callEndpoint(executor, { method: 'GET', path: rolePath(role_id) });
}

/**
 * Roles implied by this role. GET /api/v2/roles/{id}/children/
 */
export async function listRoleChildren(executor: RequestExecutor, input: RoleRelatedListInput): Promise<ListResult> {
  const params = parseInput(RoleRelatedListSchema, input);
  return listEndpoint(executor, rolePath(params.role_id, 'children'), params);
}

/**
 * Roles that imply this role. GET /api/v2/roles/{id}/parents/
 */
export async function listRoleParents(executor: RequestExecutor, input: RoleRelatedListInput): Promise<ListResult> {
  const params = parseInput(RoleRelatedListSchema, input);
  return listEndpoint(executor, rolePath(params.role_id, 'parents'), params);
}

export async function listRoleTeams(executor: RequestExecutor, input: RoleRelatedListInput): Promise<ListResult> {
  const params = parseInput(RoleRelatedListSchema, input);
  return listEndpoint(executor, rolePath(params.role_id, 'teams'), params);
}

export async function listRoleUsers(executor: RequestExecutor, input: RoleRelatedListInput): Promise<ListResult> {
  const params = parseInput(RoleRelatedListSchema, input);
  return listEndpoint(executor, rolePath(params.role_id, 'users'), params);
}

// ============================================================================
// Associate / Disassociate
// ============================================================================
// AWX sub-list endpoints associate with {"id": N} and disassociate with
// {"id": N, "disassociate": true}. Both answer 204 No Content.

export async function grantRoleToTeam(executor: RequestExecutor, input: RoleTeamInput): Promise<ResponseBody> {
  const { role_id, team_id } = parseInput(RoleTeamSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: rolePath(role_id, 'teams'),
    body: { id: team_id },
  });
}

export async function revokeRoleFromTeam(executor: RequestExecutor, input: RoleTeamInput): Promise<ResponseBody> {
  const { role_id, team_id } = parseInput(RoleTeamSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: rolePath(role_id, 'teams'),
    body: { id: team_id, disassociate: true },
  });
}

export async function grantRoleToUser(executor: RequestExecutor, input: RoleUserInput): Promise<ResponseBody> {
  const { role_id, user_id } = parseInput(RoleUserSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: rolePath(role_id, 'users'),
    body: { id: user_id },
  });
}

export async function revokeRoleFromUser(executor: RequestExecutor, input: RoleUserInput): Promise<ResponseBody> {
  const { role_id, user_id } = parseInput(RoleUserSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: rolePath(role_id, 'users'),
    body: { id: user_id, disassociate: true },
  });
}
