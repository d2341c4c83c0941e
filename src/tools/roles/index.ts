// ============================================================================
// Roles Domain Tools
// ============================================================================
// MCP tools for inspecting AWX roles and granting/revoking them for users
// and teams.
// ============================================================================

import type { ToolSpec } from '../types.js';
import { endpointHandler, idProperty, LIST_PROPERTIES } from '../shared/index.js';
import {
  ListRolesSchema,
  RoleIdSchema,
  RoleRelatedListSchema,
  RoleTeamSchema,
  RoleUserSchema,
  getRole,
  grantRoleToTeam,
  grantRoleToUser,
  listRoleChildren,
  listRoleParents,
  listRoleTeams,
  listRoleUsers,
  listRoles,
  revokeRoleFromTeam,
  revokeRoleFromUser,
} from '../roles.js';

const ROLE_RELATED_LIST_SCHEMA = {
  type: 'object' as const,
  properties: {
    role_id: idProperty('role'),
    ...LIST_PROPERTIES,
  },
  required: ['role_id'],
};

// ============================================================================
// List / Get
// ============================================================================

export const rolesListTool: ToolSpec = {
  definition: {
    name: 'roles_list',
    description: 'List roles visible to the authenticated user, e.g. to find the admin or execute role of a job template. (GET /api/v2/roles/)',
    annotations: {
      title: 'List Roles',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        ...LIST_PROPERTIES,
        role_field: {
          type: 'string',
          description: 'Filter by role field, e.g. "admin_role", "execute_role", "read_role"',
        },
        content_type: {
          type: 'integer',
          description: 'Filter by the content type ID of the resource the role belongs to',
        },
        object_id: {
          type: 'integer',
          description: 'Filter by the ID of the resource the role belongs to',
        },
      },
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/roles/' },
  handler: endpointHandler(ListRolesSchema, listRoles),
};

export const rolesGetTool: ToolSpec = {
  definition: {
    name: 'roles_get',
    description: 'Get details about a specific role, including the resource it grants access to. (GET /api/v2/roles/{id}/)',
    annotations: {
      title: 'Get Role',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        role_id: idProperty('role'),
      },
      required: ['role_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/roles/{id}/' },
  handler: endpointHandler(RoleIdSchema, getRole),
};

export const rolesListChildrenTool: ToolSpec = {
  definition: {
    name: 'roles_list_children',
    description: 'List the child roles of a role, i.e. the roles a holder of this role also receives. (GET /api/v2/roles/{id}/children/)',
    annotations: {
      title: 'List Child Roles',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: ROLE_RELATED_LIST_SCHEMA,
  },
  endpoint: { method: 'GET', path: '/api/v2/roles/{id}/children/' },
  handler: endpointHandler(RoleRelatedListSchema, listRoleChildren),
};

export const rolesListParentsTool: ToolSpec = {
  definition: {
    name: 'roles_list_parents',
    description: 'List the parent roles of a role, i.e. the roles that include this one. (GET /api/v2/roles/{id}/parents/)',
    annotations: {
      title: 'List Parent Roles',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: ROLE_RELATED_LIST_SCHEMA,
  },
  endpoint: { method: 'GET', path: '/api/v2/roles/{id}/parents/' },
  handler: endpointHandler(RoleRelatedListSchema, listRoleParents),
};

// ============================================================================
// Teams
// ============================================================================

export const rolesListTeamsTool: ToolSpec = {
  definition: {
    name: 'roles_list_teams',
    description: 'List the teams that hold a role. (GET /api/v2/roles/{id}/teams/)',
    annotations: {
      title: 'List Role Teams',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: ROLE_RELATED_LIST_SCHEMA,
  },
  endpoint: { method: 'GET', path: '/api/v2/roles/{id}/teams/' },
  handler: endpointHandler(RoleRelatedListSchema, listRoleTeams),
};

export const rolesGrantTeamTool: ToolSpec = {
  definition: {
    name: 'roles_grant_team',
    description: 'Grant a role to a team by associating the team with the role. (POST /api/v2/roles/{id}/teams/)',
    annotations: {
      title: 'Grant Role to Team',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        role_id: idProperty('role'),
        team_id: idProperty('team to grant the role to'),
      },
      required: ['role_id', 'team_id'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/roles/{id}/teams/' },
  handler: endpointHandler(RoleTeamSchema, grantRoleToTeam),
};

export const rolesRevokeTeamTool: ToolSpec = {
  definition: {
    name: 'roles_revoke_team',
    description: 'Revoke a role from a team by disassociating the team from the role. (POST /api/v2/roles/{id}/teams/ with disassociate)',
    annotations: {
      title: 'Revoke Role from Team',
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        role_id: idProperty('role'),
        team_id: idProperty('team to revoke the role from'),
      },
      required: ['role_id', 'team_id'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/roles/{id}/teams/' },
  handler: endpointHandler(RoleTeamSchema, revokeRoleFromTeam),
};

// ============================================================================
// Users
// ============================================================================

export const rolesListUsersTool: ToolSpec = {
  definition: {
    name: 'roles_list_users',
    description: 'List the users that hold a role directly. (GET /api/v2/roles/{id}/users/)',
    annotations: {
      title: 'List Role Users',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: ROLE_RELATED_LIST_SCHEMA,
  },
  endpoint: { method: 'GET', path: '/api/v2/roles/{id}/users/' },
  handler: endpointHandler(RoleRelatedListSchema, listRoleUsers),
};

export const rolesGrantUserTool: ToolSpec = {
  definition: {
    name: 'roles_grant_user',
    description: 'Grant a role to a user by associating the user with the role. (POST /api/v2/roles/{id}/users/)',
    annotations: {
      title: 'Grant Role to User',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        role_id: idProperty('role'),
        user_id: idProperty('user to grant the role to'),
      },
      required: ['role_id', 'user_id'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/roles/{id}/users/' },
  handler: endpointHandler(RoleUserSchema, grantRoleToUser),
};

export const rolesRevokeUserTool: ToolSpec = {
  definition: {
    name: 'roles_revoke_user',
    description: 'Revoke a role from a user by disassociating the user from the role. (POST /api/v2/roles/{id}/users/ with disassociate)',
    annotations: {
      title: 'Revoke Role from User',
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        role_id: idProperty('role'),
        user_id: idProperty('user to revoke the role from'),
      },
      required: ['role_id', 'user_id'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/roles/{id}/users/' },
  handler: endpointHandler(RoleUserSchema, revokeRoleFromUser),
};

// ============================================================================
// Export All Tools
// ============================================================================

export const rolesTools: ToolSpec[] = [
  rolesListTool,
  rolesGetTool,
  rolesListChildrenTool,
  rolesListParentsTool,
  rolesListTeamsTool,
  rolesGrantTeamTool,
  rolesRevokeTeamTool,
  rolesListUsersTool,
  rolesGrantUserTool,
  rolesRevokeUserTool,
];
