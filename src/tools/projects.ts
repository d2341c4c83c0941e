// ============================================================================
// Projects Endpoints
// ============================================================================

import { z } from 'zod';
import type { RequestExecutor, ResponseBody } from '../awx/index.js';
import {
  callEndpoint,
  compactBody,
  listEndpoint,
  listParams,
  parseInput,
  resourceId,
  type ListInput,
  type ListResult,
} from './shared/index.js';

/** "" and "manual" both mean playbooks live on the controller's disk */
export const SCM_TYPES = ['', 'git', 'svn', 'insights', 'archive', 'manual'] as const;

export const ListProjectsSchema = z.object(listParams);

export const ProjectIdSchema = z.object({
  project_id: resourceId,
});

export const CreateProjectSchema = z.object({
  name: z.string().min(1),
  organization_id: resourceId,
  scm_type: z.enum(SCM_TYPES),
  scm_url: z.string().min(1).optional(),
  scm_branch: z.string().optional(),
  credential_id: resourceId.optional(),
  local_path: z.string().min(1).optional(),
  description: z.string().optional(),
}).refine(v => v.scm_type === '' || v.scm_type === 'manual' || v.scm_url !== undefined, {
  message: 'scm_url is required unless scm_type is "manual" or ""',
  path: ['scm_url'],
});

export type ProjectIdInput = z.input<typeof ProjectIdSchema>;
export type CreateProjectInput = z.input<typeof CreateProjectSchema>;

/**
 * GET /api/v2/projects/
 */
export async function listProjects(executor: RequestExecutor, input: ListInput = {}): Promise<ListResult> {
  const params = parseInput(ListProjectsSchema, input);
  return listEndpoint(executor, '/api/v2/projects/', params);
}

/**
 * GET /api/v2/projects/{id}/
 */
export async function getProject(executor: RequestExecutor, input: ProjectIdInput): Promise<ResponseBody> {
  const { project_id } = parseInput(ProjectIdSchema, input);
  return callEndpoint(executor, { method: 'GET', path: `/api/v2/projects/${project_id}/` });
}

/**
 * POST /api/v2/projects/. AWX starts an SCM update right after creation.
 */
export async function createProject(executor: RequestExecutor, input: CreateProjectInput): Promise<ResponseBody> {
  const params = parseInput(CreateProjectSchema, input);
  return callEndpoint(executor, {
    method: 'POST',
    path: '/api/v2/projects/',
    body: compactBody({
      name: params.name,
      organization: params.organization_id,
      scm_type: params.scm_type,
      scm_url: params.scm_url,
      scm_branch: params.scm_branch,
      credential: params.credential_id,
      local_path: params.local_path,
      description: params.description ?? '',
    }),
  });
}
