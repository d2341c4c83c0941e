// ============================================================================
// Projects Domain Tools
// ============================================================================

import type { ToolSpec } from '../types.js';
import { endpointHandler, idProperty, LIST_PROPERTIES } from '../shared/index.js';
import {
  CreateProjectSchema,
  ListProjectsSchema,
  ProjectIdSchema,
  SCM_TYPES,
  createProject,
  getProject,
  listProjects,
} from '../projects.js';

export const projectsListTool: ToolSpec = {
  definition: {
    name: 'projects_list',
    description: 'List projects (playbook sources). (GET /api/v2/projects/)',
    annotations: {
      title: 'List Projects',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: LIST_PROPERTIES,
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/projects/' },
  handler: endpointHandler(ListProjectsSchema, listProjects),
};

export const projectsGetTool: ToolSpec = {
  definition: {
    name: 'projects_get',
    description: 'Get details about a specific project, including its last SCM update. (GET /api/v2/projects/{id}/)',
    annotations: {
      title: 'Get Project',
      readOnlyHint: true,
      destructiveHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        project_id: idProperty('project'),
      },
      required: ['project_id'],
    },
  },
  endpoint: { method: 'GET', path: '/api/v2/projects/{id}/' },
  handler: endpointHandler(ProjectIdSchema, getProject),
};

export const projectsCreateTool: ToolSpec = {
  definition: {
    name: 'projects_create',
    description: 'Create a project from a source control repository or a manual playbook directory. (POST /api/v2/projects/)',
    annotations: {
      title: 'Create Project',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
    },
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Name of the project' },
        organization_id: idProperty('organization that owns the project'),
        scm_type: {
          type: 'string',
          enum: [...SCM_TYPES],
          description: 'Source control type; "manual" or "" for playbooks on disk',
        },
        scm_url: { type: 'string', description: 'Repository URL (required unless scm_type is manual)' },
        scm_branch: { type: 'string', description: 'Branch, tag or commit to check out' },
        credential_id: idProperty('source control credential'),
        local_path: { type: 'string', description: 'Playbook directory for manual projects' },
        description: { type: 'string', description: 'Description of the project' },
      },
      required: ['name', 'organization_id', 'scm_type'],
    },
  },
  endpoint: { method: 'POST', path: '/api/v2/projects/' },
  handler: endpointHandler(CreateProjectSchema, createProject),
};

export const projectsTools: ToolSpec[] = [
  projectsListTool,
  projectsGetTool,
  projectsCreateTool,
];
