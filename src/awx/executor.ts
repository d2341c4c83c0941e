// ============================================================================
// HTTP Request Executor
// ============================================================================
// Performs one AWX request per RequestSpec. Non-2xx responses are results,
// not failures; only transport problems reject (as NetworkFailure).
// ============================================================================

import { log } from '../config.js';
import type { AuthProvider } from './auth.js';
import { ToolError, isToolError } from './errors.js';
import type { RequestExecutor, RequestSpec, ResponseBody, ResponseResult } from './types.js';
import { isRecord } from './types.js';

export interface HttpExecutorOptions {
  baseUrl: string;
  auth: AuthProvider;
  timeoutMs: number;
  /** Injected fetch; defaults to the global one */
  fetch?: typeof fetch;
}

export function buildRequestUrl(baseUrl: string, spec: Pick<RequestSpec, 'path' | 'query'>): URL {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${spec.path}`);
  if (spec.query) {
    for (const [key, value] of Object.entries(spec.query)) {
      url.searchParams.set(key, value);
    }
  }
  return url;
}

export function buildRequestHeaders(auth: AuthProvider, spec: RequestSpec): Record<string, string> {
  return {
    Accept: 'application/json',
    ...(spec.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
    ...auth.getAuthHeaders(),
    ...spec.headers,
  };
}

/**
 * Decode a response payload. Empty bodies (and 204) are null; anything that
 * is not a JSON object or array is returned as { content_type, text }.
 */
export function parseResponseBody(statusCode: number, text: string, contentType: string | null): ResponseBody {
  if (statusCode === 204 || text.trim() === '') {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    if (Array.isArray(parsed) || isRecord(parsed)) {
      return parsed;
    }
  } catch {
    // not JSON, fall through
  }

  return { content_type: contentType ?? 'unknown', text };
}

/**
 * Run one request through any executor. A rejection that is not already a
 * ToolError is reported as a NetworkFailure.
 */
export async function executeRequest(executor: RequestExecutor, spec: RequestSpec): Promise<ResponseResult> {
  try {
    return await executor.execute(spec);
  } catch (err) {
    if (isToolError(err)) throw err;
    throw networkError(spec, err);
  }
}

export function createHttpExecutor(options: HttpExecutorOptions): RequestExecutor {
  const fetchImpl = options.fetch ?? fetch;
  const { baseUrl, auth, timeoutMs } = options;
  assertBaseUrl(baseUrl);

  async function execute(spec: RequestSpec): Promise<ResponseResult> {
    if (!spec.path.startsWith('/')) {
      throw ToolError.validation(`Request path must be a relative API route starting with "/": ${spec.path}`);
    }

    const url = buildRequestUrl(baseUrl, spec);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const startTime = Date.now();

    try {
      let response: Response;
      try {
        response = await fetchImpl(url.toString(), {
          method: spec.method,
          headers: buildRequestHeaders(auth, spec),
          body: spec.body !== undefined ? JSON.stringify(spec.body) : undefined,
          signal: controller.signal,
        });
      } catch (err) {
        throw networkError(spec, err, controller.signal.aborted ? timeoutMs : undefined);
      }

      let text: string;
      try {
        text = await response.text();
      } catch (err) {
        throw networkError(spec, err, controller.signal.aborted ? timeoutMs : undefined);
      }

      log(`AWX ${spec.method} ${spec.path} -> ${response.status} (${Date.now() - startTime}ms)`);

      return {
        statusCode: response.status,
        body: parseResponseBody(response.status, text, response.headers.get('content-type')),
        ok: response.status >= 200 && response.status < 300,
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  return { execute };
}

function assertBaseUrl(baseUrl: string): void {
  let protocol: string;
  try {
    protocol = new URL(baseUrl).protocol;
  } catch {
    throw new Error(`Invalid AWX base URL: ${baseUrl}`);
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new Error(`AWX base URL must use http or https: ${baseUrl}`);
  }
}

/** `timedOutAfterMs` is set when the request was aborted by its timeout */
function networkError(spec: RequestSpec, err: unknown, timedOutAfterMs?: number): ToolError {
  if (timedOutAfterMs !== undefined) {
    return ToolError.network(`${spec.method} ${spec.path} timed out after ${timedOutAfterMs}ms`, err);
  }
  const reason = err instanceof Error
    ? (err.cause instanceof Error ? `${err.message} (${err.cause.message})` : err.message)
    : String(err);
  log(`AWX ${spec.method} ${spec.path} failed: ${reason}`);
  return ToolError.network(`${spec.method} ${spec.path} could not be completed: ${reason}`, err);
}
