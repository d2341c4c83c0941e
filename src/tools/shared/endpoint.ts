// ============================================================================
// Endpoint Helpers
// ============================================================================
// The common path of every endpoint function: one RequestSpec, one executor
// call, body on success, ToolError otherwise.
// ============================================================================

import type { z } from 'zod';
import {
  ToolError,
  collectPages,
  executeRequest,
  type CollectedPages,
  type RequestExecutor,
  type RequestSpec,
  type ResponseBody,
} from '../../awx/index.js';
import type { ToolSpec } from '../types.js';
import { toolErrorFrom, toolSuccess } from './response.js';
import { parseInput, type ListInput } from './validation.js';

export type ListResult = ResponseBody | CollectedPages;

/**
 * Execute a single request and return its body, or throw the classified
 * ToolError for a non-2xx status or a failed transport.
 */
export async function callEndpoint(executor: RequestExecutor, spec: RequestSpec): Promise<ResponseBody> {
  const result = await executeRequest(executor, spec);
  if (!result.ok) {
    throw ToolError.fromResponse(result, spec);
  }
  return result.body;
}

/**
 * Map list parameters onto AWX query parameters.
 */
export function listQuery(params: ListInput, extra: Record<string, string | number | undefined> = {}): Record<string, string> {
  const query: Record<string, string> = {};
  const entries: Array<[string, string | number | undefined]> = [
    ['page_size', params.page_size],
    ['page', params.page],
    ['search', params.search],
    ['order_by', params.order_by],
    ...Object.entries(extra),
  ];
  for (const [key, value] of entries) {
    if (value !== undefined) query[key] = String(value);
  }
  return query;
}

/**
 * GET a list endpoint. With `all_pages` every page is fetched and the
 * results concatenated; otherwise exactly one request is made.
 */
export async function listEndpoint(
  executor: RequestExecutor,
  path: string,
  params: ListInput,
  extraQuery?: Record<string, string | number | undefined>
): Promise<ListResult> {
  const spec: RequestSpec = { method: 'GET', path, query: listQuery(params, extraQuery) };
  if (params.all_pages) {
    return collectPages(executor, spec);
  }
  return callEndpoint(executor, spec);
}

/**
 * Drop undefined values so optional parameters are omitted from the body.
 */
export function compactBody(fields: Record<string, unknown>): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) body[key] = value;
  }
  return body;
}

/**
 * Build a tool handler from a schema and a typed endpoint function.
 * Input is validated before the function runs; every outcome becomes a
 * ToolResult.
 */
export function endpointHandler<S extends z.ZodTypeAny>(
  schema: S,
  fn: (executor: RequestExecutor, input: z.output<S>) => Promise<unknown>
): ToolSpec['handler'] {
  return async (args, ctx) => {
    try {
      const input = parseInput(schema, args);
      return toolSuccess(await fn(ctx.executor, input));
    } catch (err) {
      return toolErrorFrom(err);
    }
  };
}
