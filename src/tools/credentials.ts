// ============================================================================
// Credentials Endpoints
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
  type ListInput,
  type ListResult,
} from './shared/index.js';

const OWNER_FIELDS = ['organization_id', 'user_id', 'team_id'] as const;

const credentialFields = {
  name: z.string().min(1),
  credential_type: resourceId,
  inputs: jsonText,
  organization_id: resourceId,
  user_id: resourceId,
  team_id: resourceId,
  description: z.string(),
};

function singleOwner(v: Partial<Record<(typeof OWNER_FIELDS)[number], number>>): boolean {
  return OWNER_FIELDS.filter(f => v[f] !== undefined).length <= 1;
}

const SINGLE_OWNER_MESSAGE = 'Only one of organization_id, user_id or team_id can be provided';

export const ListCredentialsSchema = z.object(listParams);

export const CredentialIdSchema = z.object({
  credential_id: resourceId,
});

export const CreateCredentialSchema = z.object({
  name: credentialFields.name,
  credential_type: credentialFields.credential_type,
  inputs: credentialFields.inputs.optional(),
  organization_id: credentialFields.organization_id.optional(),
  user_id: credentialFields.user_id.optional(),
  team_id: credentialFields.team_id.optional(),
  description: credentialFields.description.optional(),
}).refine(singleOwner, { message: SINGLE_OWNER_MESSAGE });

// User and team owners are write-only on create, so an update rejects them
// instead of dropping them.
export const UpdateCredentialSchema = z.object({
  credential_id: resourceId,
  name: credentialFields.name.optional(),
  credential_type: credentialFields.credential_type.optional(),
  inputs: credentialFields.inputs.optional(),
  organization_id: credentialFields.organization_id.optional(),
  description: credentialFields.description.optional(),
})
  .strict()
  .refine(v => hasAnyOf(v, ['name', 'credential_type', 'inputs', 'organization_id', 'description']), {
    message: 'Provide at least one field to update',
  });

export type CredentialIdInput = z.input<typeof CredentialIdSchema>;
export type CreateCredentialInput = z.input<typeof CreateCredentialSchema>;
export type UpdateCredentialInput = z.input<typeof UpdateCredentialSchema>;

/**
 * AWX takes credential inputs as an object, not as text.
 */
function parseInputs(inputs: string | undefined): unknown {
  return inputs === undefined ? undefined : JSON.parse(inputs);
}

function ownerFields(v: Partial<Record<(typeof OWNER_FIELDS)[number], number>>): Record<string, number | undefined> {
  return {
    organization: v.organization_id,
    user: v.user_id,
    team: v.team_id,
  };
}

/**
 * GET /api/v2/credentials/ (secret inputs come back as "$encrypted$")
 */
export async function listCredentials(executor: RequestExecutor, input: ListInput = {}): Promise<ListResult> {
  const params = parseInput(ListCredentialsSchema, input);
  return listEndpoint(executor, '/api/v2/credentials/', params);
}

export async function getCredential(executor: RequestExecutor, input: CredentialIdInput): Promise<ResponseBody> {
  const { credential_id } = parseInput(CredentialIdSchema, input);
  return callEndpoint(executor, { method: 'GET', path: `/api/v2/credentials/${credential_id}/` });
}

/**
 * POST /api/v2/credentials/
 */
export async function createCredential(executor: RequestExecutor, input: CreateCredentialInput): Promise<ResponseBody> {
  const params = parseInput(CreateCredentialSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: '/api/v2/credentials/',
    body: compactBody({
      name: params.name,
      credential_type: params.credential_type,
      inputs: parseInputs(params.inputs ?? '{}'),
      description: params.description ?? '',
      ...ownerFields(params),
    }),
  });
}

/**
 * PATCH /api/v2/credentials/{id}/
 */
export async function updateCredential(executor: RequestExecutor, input: UpdateCredentialInput): Promise<ResponseBody> {
  const params = parseInput(UpdateCredentialSchema, input);
  return callEndpoint(executor, {
    method: 'PATCH',
    path: `/api/v2/credentials/${params.credential_id}/`,
    body: compactBody({
      name: params.name,
      credential_type: params.credential_type,
      inputs: parseInputs(params.inputs),
      description: params.description,
      organization: params.organization_id,
    }),
  });
}
