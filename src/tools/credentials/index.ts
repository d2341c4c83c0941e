// ============================================================================
// Credentials Domain Tools
// ============================================================================

import type { ToolSpec } from '../types.js';
import { endpointHandler, idProperty, LIST_PROPERTIES } from '../shared/index.js';
import {
  CreateCredentialSchema,
  CredentialIdSchema,
  ListCredentialsSchema,
  UpdateCredentialSchema,
  createCredential,
  getCredential,
  listCredentials,
  updateCredential,
} from '../credentials.js';

const CREDENTIAL_PROPERTIES = {
  credential_type: idProperty('credential type (e.g. 1 for Machine)'),
  inputs: {
    type: 'string',
    description: 'Credential inputs as a JSON string, e.g. "{\\"username\\": \\"deploy\\"}"',
  },
  organization_id: idProperty('owning organization (only one owner allowed)'),
  description: { type: 'string', description: 'Description of the credential' },
};

// AWX only reads user and team owners when the credential is created
const OWNER_PROPERTIES = {
  user_id: idProperty('owning user (only one owner allowed)'),
  team_id: idProperty('owning team (only one owner allowed)'),
};

export const credentialsListTool: ToolSpec = {
  definition: {
    name: 'credentials_list',
    description: 'List credentials. Secret values are returned encrypted. (GET /api/v2/credentials/)',
    annotations: {
      title: 'List Credentials',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: LIST_PROPERTIES,
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/credentials/' },
  handler: endpointHandler(ListCredentialsSchema, listCredentials),
};

export const credentialsGetTool: ToolSpec = {
  definition: {
    name: 'credentials_get',
    description: 'Get details about a specific credential. (GET /api/v2/credentials/{id}/)',
    annotations: {
      title: 'Get Credential',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        credential_id: idProperty('credential'),
      },
      required: ['credential_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/credentials/{id}/' },
  handler: endpointHandler(CredentialIdSchema, getCredential),
};

export const credentialsCreateTool: ToolSpec = {
  definition: {
    name: 'credentials_create',
    description: 'Create a credential of a given credential type, owned by at most one organization, user or team. (POST /api/v2/credentials/)',
    annotations: {
      title: 'Create Credential',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Name of the credential' },
        ...CREDENTIAL_PROPERTIES,
        ...OWNER_PROPERTIES,
      },
      required: ['name', 'credential_type'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/credentials/' },
  handler: endpointHandler(CreateCredentialSchema, createCredential),
};

export const credentialsUpdateTool: ToolSpec = {
  definition: {
    name: 'credentials_update',
    description: 'Update a credential. Only the given fields change; the owner can only be moved to another organization. (PATCH /api/v2/credentials/{id}/)',
    annotations: {
      title: 'Update Credential',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        credential_id: idProperty('credential'),
        name: { type: 'string', description: 'New name' },
        ...CREDENTIAL_PROPERTIES,
      },
      required: ['credential_id'],
      additionalProperties: false,
    },
  },
  endpoint: { method: 'PATCH', path: '/api/v2/credentials/{id}/' },
  handler: endpointHandler(UpdateCredentialSchema, updateCredential),
};

export const credentialsTools: ToolSpec[] = [
  credentialsListTool,
  credentialsGetTool,
  credentialsCreateTool,
  credentialsUpdateTool,
];
