// ============================================================================
// AWX Client Layer: public API
// ============================================================================

export type {
  HttpMethod,
  RequestSpec,
  ResponseBody,
  ResponseResult,
  RequestExecutor,
  AwxPage,
} from './types.js';
export { HTTP_METHODS, isRecord, isAwxPage } from './types.js';
export type { ToolErrorKind, ToolErrorPayload } from './errors.js';
export { ToolError, isToolError, classifyStatus, describeErrorBody } from './errors.js';
export type { AuthProvider } from './auth.js';
export { TokenAuth, BasicAuth, AnonymousAuth, createAuthProvider } from './auth.js';
export type { HttpExecutorOptions } from './executor.js';
export { createHttpExecutor, executeRequest } from './executor.js';
export type { CollectedPages } from './pagination.js';
export { collectPages, MAX_PAGES } from './pagination.js';
