// ============================================================================
// Organizations Domain Tools
// ============================================================================

import type { ToolSpec } from '../types.js';
import { endpointHandler, idProperty, LIST_PROPERTIES } from '../shared/index.js';
import {
  CreateOrganizationSchema,
  ListOrganizationsSchema,
  OrganizationIdSchema,
  createOrganization,
  getOrganization,
  listOrganizations,
} from '../organizations.js';

export const organizationsListTool: ToolSpec = {
  definition: {
    name: 'organizations_list',
    description: 'List organizations. (GET /api/v2/organizations/)',
    annotations: {
      title: 'List Organizations',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: LIST_PROPERTIES,
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/organizations/' },
  handler: endpointHandler(ListOrganizationsSchema, listOrganizations),
};

export const organizationsGetTool: ToolSpec = {
  definition: {
    name: 'organizations_get',
    description: 'Get details about a specific organization. (GET /api/v2/organizations/{id}/)',
    annotations: {
      title: 'Get Organization',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        organization_id: idProperty('organization'),
      },
      required: ['organization_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/organizations/{id}/' },
  handler: endpointHandler(OrganizationIdSchema, getOrganization),
};

export const organizationsCreateTool: ToolSpec = {
  definition: {
    name: 'organizations_create',
    description: 'Create a new organization. (POST /api/v2/organizations/)',
    annotations: {
      title: 'Create Organization',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Name of the organization' },
        description: { type: 'string', description: 'Description of the organization' },
      },
      required: ['name'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/organizations/' },
  handler: endpointHandler(CreateOrganizationSchema, createOrganization),
};

export const organizationsTools: ToolSpec[] = [
  organizationsListTool,
  organizationsGetTool,
  organizationsCreateTool,
];
