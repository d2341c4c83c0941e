// ============================================================================
// Tools Aggregator
// ============================================================================
// Central registry of all endpoint tools, keyed by group.
// ============================================================================

import type { ToolSpec } from './types.js';
import { rolesTools } from './roles/index.js';
import { usersTools } from './users/index.js';
import { inventoriesTools } from './inventories/index.js';
import { hostsTools } from './hosts/index.js';
import { templatesTools } from './templates/index.js';
import { jobsTools } from './jobs/index.js';
import { projectsTools } from './projects/index.js';
import { organizationsTools } from './organizations/index.js';
import { credentialsTools } from './credentials/index.js';
import { systemTools } from './system/index.js';

// ============================================================================
// Groups
// ============================================================================
// Every tool is named `<group>_<action>`; the group is also the facade name.

export const toolGroups = {
  roles: rolesTools,
  users: usersTools,
  inventories: inventoriesTools,
  hosts: hostsTools,
  templates: templatesTools,
  jobs: jobsTools,
  projects: projectsTools,
  organizations: organizationsTools,
  credentials: credentialsTools,
  system: systemTools,
} satisfies Record<string, ToolSpec[]>;

export type ToolGroup = keyof typeof toolGroups;

export const allTools: ToolSpec[] = Object.values(toolGroups).flat();

// ============================================================================
// Tool Map for Fast Lookup
// ============================================================================

export const toolMap = new Map(
  allTools.map(t => [t.definition.name, t])
);

/** Group a tool belongs to, derived from its name prefix */
export function groupOf(toolName: string): string {
  const idx = toolName.indexOf('_');
  return idx === -1 ? toolName : toolName.slice(0, idx);
}

export function getToolNames(): string[] {
  return allTools.map(t => t.definition.name);
}
