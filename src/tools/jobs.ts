// ============================================================================
// Jobs Endpoints
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

export const JOB_STATUSES = [
  'new',
  'pending',
  'waiting',
  'running',
  'successful',
  'failed',
  'error',
  'canceled',
] as const;

export const STDOUT_FORMATS = ['txt', 'ansi', 'json', 'html'] as const;

export const ListJobsSchema = z.object({
  ...listParams,
  status: z.enum(JOB_STATUSES).optional(),
});

export const JobIdSchema = z.object({
  job_id: resourceId,
});

export const JobStdoutSchema = z.object({
  job_id: resourceId,
  format: z.enum(STDOUT_FORMATS).optional(),
});

export type ListJobsInput = z.input<typeof ListJobsSchema>;
export type JobIdInput = z.input<typeof JobIdSchema>;
export type JobStdoutInput = z.input<typeof JobStdoutSchema>;

/**
 * GET /api/v2/jobs/
 */
export async function listJobs(executor: RequestExecutor, input: ListJobsInput = {}): Promise<ListResult> {
  const params = parseInput(ListJobsSchema, input);
  return listEndpoint(executor, '/api/v2/jobs/', params, { status: params.status });
}

/**
 * GET /api/v2/jobs/{id}/
 */
export async function getJob(executor: RequestExecutor, input: JobIdInput): Promise<ResponseBody> {
  const { job_id } = parseInput(JobIdSchema, input);
  return callEndpoint(executor, { method: 'GET', path: `/api/v2/jobs/${job_id}/` });
}

/**
 * POST /api/v2/jobs/{id}/cancel/. AWX answers 405 when the job already
 * finished.
 */
export async function cancelJob(executor: RequestExecutor, input: JobIdInput): Promise<ResponseBody> {
  const { job_id } = parseInput(JobIdSchema, input);
  return callEndpoint(executor, { method: 'POST', path: `/api/v2/jobs/${job_id}/cancel/` });
}

/**
 * GET /api/v2/jobs/{id}/stdout/?format=txt
 *
 * Non-JSON formats come back as { content_type, text }.
 */
export async function getJobStdout(executor: RequestExecutor, input: JobStdoutInput): Promise<ResponseBody> {
  const { job_id, format } = parseInput(JobStdoutSchema, input);
  return callEndpoint(executor, {
    method: 'GET',
    path: `/api/v2/jobs/${job_id}/stdout/`,
    query: { format: format ?? 'txt' },
  });
}
