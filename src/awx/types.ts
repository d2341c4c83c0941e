// ============================================================================
// AWX Request / Response Types
// ============================================================================

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * One HTTP call against the AWX API. Built per call, used once.
 * `path` is relative to the instance base URL and starts with "/".
 */
export interface RequestSpec {
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  body?: Record<string, unknown>;
  headers?: Record<string, string>;
}

/** Parsed response payload: a JSON object, a JSON array, or nothing */
export type ResponseBody = Record<string, unknown> | unknown[] | null;

/**
 * Outcome of any completed HTTP exchange, including 4xx/5xx.
 */
export interface ResponseResult {
  statusCode: number;
  body: ResponseBody;
  /** true for 2xx */
  ok: boolean;
}

/**
 * Performs a RequestSpec. Implementations hold only immutable configuration
 * and may be shared by concurrent callers.
 */
export interface RequestExecutor {
  execute(spec: RequestSpec): Promise<ResponseResult>;
}

/** Standard AWX list envelope */
export interface AwxPage {
  count?: number;
  next?: string | null;
  previous?: string | null;
  results: unknown[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAwxPage(body: ResponseBody): body is Record<string, unknown> & AwxPage {
  return isRecord(body) && Array.isArray(body.results);
}
