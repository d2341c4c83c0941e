// ============================================================================
// Shared Helpers - Barrel Export
// ============================================================================

export { toolSuccess, toolError, toolErrorFrom } from './response.js';
export { parseInput, resourceId, jsonText, listParams, hasAnyOf } from './validation.js';
export type { ListInput } from './validation.js';
export type { ListResult } from './endpoint.js';
export { callEndpoint, listEndpoint, listQuery, compactBody, endpointHandler } from './endpoint.js';
export { LIST_PROPERTIES, idProperty } from './schemas.js';
