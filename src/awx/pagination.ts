// ============================================================================
// Pagination
// ============================================================================
// Follows AWX `next` links and concatenates `results`.
// ============================================================================

import { ToolError } from './errors.js';
import { executeRequest } from './executor.js';
import type { RequestExecutor, RequestSpec } from './types.js';
import { isAwxPage } from './types.js';

export const MAX_PAGES = 50;

export interface CollectedPages {
  count: number;
  results: unknown[];
  /** true when MAX_PAGES was reached before the last page */
  truncated: boolean;
}

/**
 * AWX returns `next` as a path ("/api/v2/roles/?page=2"); older versions
 * and proxies sometimes return a full URL. Either way only the path and
 * query are kept so the request stays on the configured instance.
 */
export function toRelativePath(next: string): string {
  if (next.startsWith('/')) return next;
  const url = new URL(next);
  return `${url.pathname}${url.search}`;
}

/**
 * Request the first page described by `spec` and every following page.
 * A body without `results` is returned as a single result.
 */
export async function collectPages(
  executor: RequestExecutor,
  spec: RequestSpec,
  maxPages: number = MAX_PAGES
): Promise<CollectedPages> {
  const results: unknown[] = [];
  let current: RequestSpec | null = spec;
  let pages = 0;
  let count = 0;

  while (current && pages < maxPages) {
    const response = await executeRequest(executor, current);
    pages++;

    if (!response.ok) {
      throw ToolError.fromResponse(response, current);
    }

    const body = response.body;
    if (!isAwxPage(body)) {
      return { count: 1, results: [body], truncated: false };
    }

    results.push(...body.results);
    if (typeof body.count === 'number') count = body.count;

    current = typeof body.next === 'string' && body.next
      ? { method: 'GET', path: toRelativePath(body.next), headers: spec.headers }
      : null;
  }

  return {
    count: Math.max(count, results.length),
    results,
    truncated: current !== null,
  };
}
