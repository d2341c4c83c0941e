import path from 'path';
import os from 'os';

export type ToolExposure = 'tools' | 'facades';

/**
 * Connection settings for one AWX instance.
 */
export interface AwxInstanceConfig {
  name: string;
  baseUrl: string;
  token?: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  verifySsl: boolean;
}

export interface Config {
  env: string;
  /** Instance built from ANSIBLE_* variables, if ANSIBLE_BASE_URL is set */
  instance?: AwxInstanceConfig;
  /** YAML file with additional instances */
  instancesPath: string;
  exposure: ToolExposure;
  /** Restrict the server to these endpoint groups (undefined = all) */
  allowedGroups?: string[];
}

export const DEFAULT_INSTANCE_NAME = 'default';
export const DEFAULT_TIMEOUT_MS = 30_000;

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseTimeout(value: string | undefined): number {
  const parsed = value ? parseInt(value, 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export function getConfig(): Config {
  const baseUrl = process.env.ANSIBLE_BASE_URL?.trim();

  return {
    env: process.env.AWX_TOOLS_ENV || 'dev',
    instance: baseUrl
      ? {
          name: DEFAULT_INSTANCE_NAME,
          baseUrl,
          token: process.env.ANSIBLE_TOKEN || undefined,
          username: process.env.ANSIBLE_USERNAME || undefined,
          password: process.env.ANSIBLE_PASSWORD || undefined,
          timeoutMs: parseTimeout(process.env.ANSIBLE_TIMEOUT_MS),
          verifySsl: parseBoolean(process.env.ANSIBLE_VERIFY_SSL, true),
        }
      : undefined,
    instancesPath: process.env.AWX_TOOLS_CONFIG || path.join(os.homedir(), '.awx-tools', 'config.yaml'),
    exposure: process.env.AWX_TOOLS_EXPOSURE === 'facades' ? 'facades' : 'tools',
    allowedGroups: parseList(process.env.AWX_TOOLS_GROUPS),
  };
}

// stdout carries the MCP protocol, so logs go to stderr
export function log(message: string, ...args: unknown[]): void {
  const config = getConfig();
  if (config.env === 'dev') {
    console.error(`[awx-tools] ${message}`, ...args);
  }
}
