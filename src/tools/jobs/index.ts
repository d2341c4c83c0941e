// ============================================================================
// Jobs Domain Tools
// ============================================================================

import type { ToolSpec } from '../types.js';
import { endpointHandler, idProperty, LIST_PROPERTIES } from '../shared/index.js';
import {
  JOB_STATUSES,
  JobIdSchema,
  JobStdoutSchema,
  ListJobsSchema,
  STDOUT_FORMATS,
  cancelJob,
  getJob,
  getJobStdout,
  listJobs,
} from '../jobs.js';

export const jobsListTool: ToolSpec = {
  definition: {
    name: 'jobs_list',
    description: 'List jobs, optionally filtered by status. (GET /api/v2/jobs/)',
    annotations: {
      title: 'List Jobs',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        status: {
          type: 'string',
          enum: [...JOB_STATUSES],
          description: 'Only return jobs in this status',
        },
        ...LIST_PROPERTIES,
      },
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/jobs/' },
  handler: endpointHandler(ListJobsSchema, listJobs),
};

export const jobsGetTool: ToolSpec = {
  definition: {
    name: 'jobs_get',
    description: 'Get details and status of a specific job. (GET /api/v2/jobs/{id}/)',
    annotations: {
      title: 'Get Job',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        job_id: idProperty('job'),
      },
      required: ['job_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/jobs/{id}/' },
  handler: endpointHandler(JobIdSchema, getJob),
};

export const jobsCancelTool: ToolSpec = {
  definition: {
    name: 'jobs_cancel',
    description: 'Cancel a pending or running job. (POST /api/v2/jobs/{id}/cancel/)',
    annotations: {
      title: 'Cancel Job',
      readOnlyHint: false,
      destructiveHint: true,
      idempotentHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        job_id: idProperty('job to cancel'),
      },
      required: ['job_id'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/jobs/{id}/cancel/' },
  handler: endpointHandler(JobIdSchema, cancelJob),
};

export const jobsStdoutTool: ToolSpec = {
  definition: {
    name: 'jobs_stdout',
    description: 'Get the output of a job. (GET /api/v2/jobs/{id}/stdout/)',
    annotations: {
      title: 'Get Job Output',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        job_id: idProperty('job'),
        format: {
          type: 'string',
          enum: [...STDOUT_FORMATS],
          description: 'Output format (default: txt)',
        },
      },
      required: ['job_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/jobs/{id}/stdout/' },
  handler: endpointHandler(JobStdoutSchema, getJobStdout),
};

export const jobsTools: ToolSpec[] = [
  jobsListTool,
  jobsGetTool,
  jobsCancelTool,
  jobsStdoutTool,
];
