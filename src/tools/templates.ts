// ============================================================================
// Job Templates Endpoints
// ============================================================================

import { z } from 'zod';
import type { RequestExecutor, ResponseBody } from '../awx/index.js';
import {
  callEndpoint,
  compactBody,
  jsonText,
  listEndpoint,
  listParams,
  parseInput,
  resourceId,
  type ListInput,
  type ListResult,
} from './shared/index.js';

export const JOB_TYPES = ['run', 'check'] as const;

export const ListTemplatesSchema = z.object(listParams);

export const TemplateIdSchema = z.object({
  template_id: resourceId,
});

export const CreateTemplateSchema = z.object({
  name: z.string().min(1),
  inventory_id: resourceId,
  project_id: resourceId,
  playbook: z.string().min(1),
  credential_id: resourceId.optional(),
  description: z.string().optional(),
  extra_vars: jsonText.optional(),
  job_type: z.enum(JOB_TYPES).optional(),
});

export const LaunchTemplateSchema = z.object({
  template_id: resourceId,
  extra_vars: jsonText.optional(),
});

export type TemplateIdInput = z.input<typeof TemplateIdSchema>;
export type CreateTemplateInput = z.input<typeof CreateTemplateSchema>;
export type LaunchTemplateInput = z.input<typeof LaunchTemplateSchema>;

/**
 * GET /api/v2/job_templates/
 */
export async function listTemplates(executor: RequestExecutor, input: ListInput = {}): Promise<ListResult> {
  const params = parseInput(ListTemplatesSchema, input);
  return listEndpoint(executor, '/api/v2/job_templates/', params);
}

/**
 * GET /api/v2/job_templates/{id}/
 */
export async function getTemplate(executor: RequestExecutor, input: TemplateIdInput): Promise<ResponseBody> {
  const { template_id } = parseInput(TemplateIdSchema, input);
  return callEndpoint(executor, { method: 'GET', path: `/api/v2/job_templates/${template_id}/` });
}

/**
 * POST /api/v2/job_templates/. job_type defaults to "run".
 */
export async function createTemplate(executor: RequestExecutor, input: CreateTemplateInput): Promise<ResponseBody> {
  const params = parseInput(CreateTemplateSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: '/api/v2/job_templates/',
    body: compactBody({
      name: params.name,
      inventory: params.inventory_id,
      project: params.project_id,
      playbook: params.playbook,
      credential: params.credential_id,
      description: params.description ?? '',
      extra_vars: params.extra_vars ?? '{}',
      job_type: params.job_type ?? 'run',
      verbosity: 0,
    }),
  });
}

/**
 * Start a job from a template. Returns the new job (status "pending").
 * POST /api/v2/job_templates/{id}/launch/
 */
export async function launchTemplate(executor: RequestExecutor, input: LaunchTemplateInput): Promise<ResponseBody> {
  const { template_id, extra_vars } = parseInput(LaunchTemplateSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: `/api/v2/job_templates/${template_id}/launch/`,
    body: compactBody({ extra_vars }),
  });
}
