// ============================================================================
// System Endpoints
// ============================================================================
// Instance health, dashboard counters, and a raw request escape hatch for
// API routes no named tool covers.
// ============================================================================

import { z } from 'zod';
import { HTTP_METHODS, type RequestExecutor, type ResponseBody } from '../awx/index.js';
import { callEndpoint, parseInput } from './shared/index.js';

export const API_PREFIX = '/api/v2/';

/**
 * Path as the HTTP client will send it, after percent-decoding of dot
 * segments, backslash folding and `..` resolution.
 */
export function normalizeApiPath(path: string): string | undefined {
  try {
    return new URL(path, 'http://awx.invalid').pathname;
  } catch {
    return undefined;
  }
}

export const SystemRequestSchema = z.object({
  method: z.enum(HTTP_METHODS),
  path: z.string()
    .startsWith(API_PREFIX, { message: `Path must start with ${API_PREFIX}` })
    .refine(p => !p.split(/[/\\?]/).includes('..'), { message: 'Path must not contain ".." segments' })
    .refine(p => normalizeApiPath(p)?.startsWith(API_PREFIX) === true, {
      message: `Path must stay under ${API_PREFIX}`,
    }),
  query: z.record(z.string()).optional(),
  body: z.record(z.unknown()).optional(),
});

export type SystemRequestInput = z.input<typeof SystemRequestSchema>;

/**
 * GET /api/v2/ping/ (version, active node, instance groups). Reachable
 * without authentication.
 */
export async function ping(executor: RequestExecutor): Promise<ResponseBody> {
  return callEndpoint(executor, { method: 'GET', path: '/api/v2/ping/' });
}

/**
 * GET /api/v2/dashboard/
 */
export async function getDashboard(executor: RequestExecutor): Promise<ResponseBody> {
  return callEndpoint(executor, { method: 'GET', path: '/api/v2/dashboard/' });
}

/**
 * Issue a single request to any /api/v2/ route.
 */
export async function systemRequest(executor: RequestExecutor, input: SystemRequestInput): Promise<ResponseBody> {
  const { method, path, query, body } = parseInput(SystemRequestSchema, input);
  return callEndpoint(executor, { method, path, query, body });
}
