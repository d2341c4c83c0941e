// ============================================================================
// Tool Errors
// ============================================================================
// The single error type that crosses the endpoint-function boundary.
// ============================================================================

import type { RequestSpec, ResponseBody, ResponseResult } from './types.js';
import { isRecord } from './types.js';

export type ToolErrorKind =
  | 'NetworkFailure'
  | 'AuthFailure'
  | 'ClientError'
  | 'ServerError'
  | 'ValidationFailure';

export interface ToolErrorOptions {
  statusCode?: number;
  details?: unknown;
  cause?: unknown;
}

/** Wire shape of a ToolError inside an MCP error result */
export interface ToolErrorPayload {
  kind: ToolErrorKind;
  message: string;
  status_code?: number;
  details?: unknown;
}

export class ToolError extends Error {
  readonly kind: ToolErrorKind;
  readonly statusCode?: number;
  readonly details?: unknown;

  constructor(kind: ToolErrorKind, message: string, options: ToolErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ToolError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }

  toJSON(): ToolErrorPayload {
    const payload: ToolErrorPayload = { kind: this.kind, message: this.message };
    if (this.statusCode !== undefined) payload.status_code = this.statusCode;
    if (this.details !== undefined) payload.details = this.details;
    return payload;
  }

  static validation(message: string, details?: unknown): ToolError {
    return new ToolError('ValidationFailure', message, { details });
  }

  static network(message: string, cause?: unknown): ToolError {
    return new ToolError('NetworkFailure', message, { cause });
  }

  /**
   * Classify a non-2xx response. 401/403 are AuthFailure, other 4xx
   * ClientError, 5xx ServerError.
   */
  static fromResponse(result: ResponseResult, spec: RequestSpec): ToolError {
    const detail = describeErrorBody(result.body);
    const message = `${spec.method} ${spec.path} failed with status ${result.statusCode}${detail ? `: ${detail}` : ''}`;
    const options: ToolErrorOptions = {
      statusCode: result.statusCode,
      details: result.body ?? undefined,
    };
    return new ToolError(classifyStatus(result.statusCode), message, options);
  }
}

export function classifyStatus(statusCode: number): ToolErrorKind {
  if (statusCode === 401 || statusCode === 403) return 'AuthFailure';
  if (statusCode >= 500) return 'ServerError';
  return 'ClientError';
}

export function isToolError(err: unknown): err is ToolError {
  return err instanceof ToolError;
}

/**
 * Pull a human-readable message out of an AWX error body.
 * AWX uses {"detail": "..."} for most errors and {"field": ["msg"]} for
 * serializer validation errors.
 */
export function describeErrorBody(body: ResponseBody): string | undefined {
  if (body === null) return undefined;

  if (Array.isArray(body)) {
    const parts = body.filter((v): v is string => typeof v === 'string');
    return parts.length > 0 ? parts.join('; ') : undefined;
  }

  if (typeof body.detail === 'string') return body.detail;
  if (typeof body.error === 'string') return body.error;
  if (typeof body.text === 'string' && body.text.trim()) return body.text.trim().slice(0, 200);

  const fieldErrors: string[] = [];
  for (const [field, value] of Object.entries(body)) {
    if (Array.isArray(value)) {
      const messages = value.filter((v): v is string => typeof v === 'string');
      if (messages.length > 0) fieldErrors.push(`${field}: ${messages.join(' ')}`);
    } else if (isRecord(value) && typeof value.detail === 'string') {
      fieldErrors.push(`${field}: ${value.detail}`);
    }
  }
  return fieldErrors.length > 0 ? fieldErrors.join('; ') : undefined;
}
