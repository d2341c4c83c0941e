// ============================================================================
// Job Templates Domain Tools
// ============================================================================

import type { ToolSpec } from '../types.js';
import { endpointHandler, idProperty, LIST_PROPERTIES } from '../shared/index.js';
import {
  CreateTemplateSchema,
  JOB_TYPES,
  LaunchTemplateSchema,
  ListTemplatesSchema,
  TemplateIdSchema,
  createTemplate,
  getTemplate,
  launchTemplate,
  listTemplates,
} from '../templates.js';

export const templatesListTool: ToolSpec = {
  definition: {
    name: 'templates_list',
    description: 'List job templates. (GET /api/v2/job_templates/)',
    annotations: {
      title: 'List Job Templates',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: LIST_PROPERTIES,
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/job_templates/' },
  handler: endpointHandler(ListTemplatesSchema, listTemplates),
};

export const templatesGetTool: ToolSpec = {
  definition: {
    name: 'templates_get',
    description: 'Get details about a specific job template. (GET /api/v2/job_templates/{id}/)',
    annotations: {
      title: 'Get Job Template',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        template_id: idProperty('job template'),
      },
      required: ['template_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/job_templates/{id}/' },
  handler: endpointHandler(TemplateIdSchema, getTemplate),
};

export const templatesCreateTool: ToolSpec = {
  definition: {
    name: 'templates_create',
    description: 'Create a job template that runs a playbook from a project against an inventory. (POST /api/v2/job_templates/)',
    annotations: {
      title: 'Create Job Template',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Name of the job template' },
        inventory_id: idProperty('inventory'),
        project_id: idProperty('project'),
        playbook: { type: 'string', description: 'Playbook file in the project, e.g. "site.yml"' },
        credential_id: idProperty('machine credential'),
        description: { type: 'string', description: 'Description of the job template' },
        extra_vars: { type: 'string', description: 'Extra variables as a JSON string (default: "{}")' },
        job_type: {
          type: 'string',
          enum: [...JOB_TYPES],
          description: 'Job type (default: run)',
        },
      },
      required: ['name', 'inventory_id', 'project_id', 'playbook'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/job_templates/' },
  handler: endpointHandler(CreateTemplateSchema, createTemplate),
};

export const templatesLaunchTool: ToolSpec = {
  definition: {
    name: 'templates_launch',
    description: 'Launch a job from a job template, optionally overriding extra variables. Returns the new job. (POST /api/v2/job_templates/{id}/launch/)',
    annotations: {
      title: 'Launch Job Template',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        template_id: idProperty('job template to launch'),
        extra_vars: { type: 'string', description: 'Extra variables as a JSON string' },
      },
      required: ['template_id'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/job_templates/{id}/launch/' },
  handler: endpointHandler(LaunchTemplateSchema, launchTemplate),
};

export const templatesTools: ToolSpec[] = [
  templatesListTool,
  templatesGetTool,
  templatesCreateTool,
  templatesLaunchTool,
];
