// ============================================================================
// Facade Definitions
// ============================================================================
// One facade per endpoint group. Action names are the tool names without
// the group prefix (roles_grant_user → grant_user).
// ============================================================================

import { toolGroups, type ToolGroup } from '../tools/index.js';
import type { FacadeSpec } from './types.js';

const FACADE_DESCRIPTIONS: Record<ToolGroup, string> = {
  roles: 'AWX role-based access: inspect roles and grant or revoke them for users and teams.',
  users: 'AWX users and the roles they hold.',
  inventories: 'AWX inventories: list, inspect, create, update and delete.',
  hosts: 'Hosts inside AWX inventories.',
  templates: 'Job templates: list, inspect, create and launch.',
  jobs: 'Jobs: status, output and cancellation.',
  projects: 'Projects (playbook sources from SCM or disk).',
  organizations: 'AWX organizations.',
  credentials: 'Credentials used by jobs, projects and inventory sources.',
  system: 'Instance health, dashboard counters and raw API requests.',
};

function buildFacade(group: ToolGroup): FacadeSpec {
  const prefix = `${group}_`;
  const actions: Record<string, string> = {};
  for (const tool of toolGroups[group]) {
    const name = tool.definition.name;
    actions[name.startsWith(prefix) ? name.slice(prefix.length) : name] = name;
  }
  return {
    name: group,
    description: FACADE_DESCRIPTIONS[group],
    actions,
  };
}

export const allFacadeDefinitions: FacadeSpec[] = [
  buildFacade('roles'),
  buildFacade('users'),
  buildFacade('inventories'),
  buildFacade('hosts'),
  buildFacade('templates'),
  buildFacade('jobs'),
  buildFacade('projects'),
  buildFacade('organizations'),
  buildFacade('credentials'),
  buildFacade('system'),
];
