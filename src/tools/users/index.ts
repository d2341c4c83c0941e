// ============================================================================
// Users Domain Tools
// ============================================================================

import type { ToolSpec } from '../types.js';
import { endpointHandler, idProperty, LIST_PROPERTIES } from '../shared/index.js';
import {
  ListUsersSchema,
  UserIdSchema,
  UserRolesSchema,
  getUser,
  listUserRoles,
  listUsers,
} from '../users.js';

export const usersListTool: ToolSpec = {
  definition: {
    name: 'users_list',
    description: 'List all users. (GET /api/v2/users/)',
    annotations: {
      title: 'List Users',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: { ...LIST_PROPERTIES },
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/users/' },
  handler: endpointHandler(ListUsersSchema, listUsers),
};

export const usersGetTool: ToolSpec = {
  definition: {
    name: 'users_get',
    description: 'Get details about a specific user. (GET /api/v2/users/{id}/)',
    annotations: {
      title: 'Get User',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        user_id: idProperty('user'),
      },
      required: ['user_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/users/{id}/' },
  handler: endpointHandler(UserIdSchema, getUser),
};

export const usersListRolesTool: ToolSpec = {
  definition: {
    name: 'users_list_roles',
    description: 'List the roles a user holds, to audit what the user can access. (GET /api/v2/users/{id}/roles/)',
    annotations: {
      title: 'List User Roles',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        user_id: idProperty('user'),
        ...LIST_PROPERTIES,
      },
      required: ['user_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/users/{id}/roles/' },
  handler: endpointHandler(UserRolesSchema, listUserRoles),
};

export const usersTools: ToolSpec[] = [
  usersListTool,
  usersGetTool,
  usersListRolesTool,
];
