// ============================================================================
// Instance Registry: YAML-based multi-instance configuration
// ============================================================================
// Loads additional AWX instances from ~/.awx-tools/config.yaml (or
// AWX_TOOLS_CONFIG). The ANSIBLE_* environment instance, when present, is
// registered as "default" and wins over a file entry of the same name.
// ============================================================================

import { existsSync, readFileSync } from 'fs';
import YAML from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_INSTANCE_NAME,
  DEFAULT_TIMEOUT_MS,
  type AwxInstanceConfig,
  type Config,
  log,
} from './config.js';
import { createAuthProvider, createHttpExecutor, type RequestExecutor } from './awx/index.js';

// ============================================================================
// File Schema
// ============================================================================

const InstanceEntrySchema = z.object({
  base_url: z.string().url(),
  token: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
  timeout_ms: z.number().int().positive().optional(),
  verify_ssl: z.boolean().optional(),
});

const InstancesFileSchema = z.object({
  default: z.string().min(1).optional(),
  instances: z.record(InstanceEntrySchema).default({}),
});

export interface ParsedInstances {
  defaultName?: string;
  instances: AwxInstanceConfig[];
}

export interface InstanceRegistry {
  defaultInstance: string;
  instances: Map<string, AwxInstanceConfig>;
}

// ============================================================================
// Load & Parse
// ============================================================================

/**
 * Parse the YAML instances document. Throws with the offending path when
 * the document does not match the schema.
 */
export function parseInstancesFile(raw: string): ParsedInstances {
  const parsed: unknown = YAML.parse(raw) ?? {};
  const result = InstancesFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid instances file: ${issues}`);
  }

  const instances = Object.entries(result.data.instances).map(([name, entry]): AwxInstanceConfig => ({
    name,
    baseUrl: entry.base_url,
    token: entry.token,
    username: entry.username,
    password: entry.password,
    timeoutMs: entry.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    verifySsl: entry.verify_ssl ?? true,
  }));
  return { defaultName: result.data.default, instances };
}

/**
 * Build the registry from the environment instance and the instances file.
 * A missing file is not an error; a malformed one is.
 */
export function loadInstanceRegistry(config: Config): InstanceRegistry {
  const instances = new Map<string, AwxInstanceConfig>();
  let fileDefault: string | undefined;

  if (existsSync(config.instancesPath)) {
    const fromFile = parseInstancesFile(readFileSync(config.instancesPath, 'utf-8'));
    for (const instance of fromFile.instances) {
      instances.set(instance.name, instance);
    }
    fileDefault = fromFile.defaultName;
    log(`Instances: loaded ${fromFile.instances.length} from ${config.instancesPath}`);
  }

  if (config.instance) {
    instances.set(config.instance.name, config.instance);
  }

  if (instances.size === 0) {
    throw new Error(
      `No AWX instance configured. Set ANSIBLE_BASE_URL or add instances to ${config.instancesPath}`
    );
  }

  const defaultInstance = config.instance
    ? DEFAULT_INSTANCE_NAME
    : fileDefault ?? instances.keys().next().value ?? DEFAULT_INSTANCE_NAME;

  if (!instances.has(defaultInstance)) {
    throw new Error(
      `Default instance "${defaultInstance}" is not defined. Known instances: ${[...instances.keys()].join(', ')}`
    );
  }

  return { defaultInstance, instances };
}

// ============================================================================
// Executors
// ============================================================================

export interface ExecutorFactoryOptions {
  /** Injected fetch shared by every executor; defaults to the global one */
  fetch?: typeof fetch;
}

/**
 * One HTTP executor per configured instance, keyed by instance name.
 */
export function createExecutors(
  registry: InstanceRegistry,
  options: ExecutorFactoryOptions = {}
): Map<string, RequestExecutor> {
  const executors = new Map<string, RequestExecutor>();
  for (const [name, instance] of registry.instances) {
    executors.set(name, createHttpExecutor({
      baseUrl: instance.baseUrl,
      auth: createAuthProvider(instance),
      timeoutMs: instance.timeoutMs,
      fetch: options.fetch,
    }));
  }
  return executors;
}
