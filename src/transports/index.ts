// ============================================================================
// Transport Layer: public API
// ============================================================================

export { createMcpServer, contextFromMeta, SERVER_NAME, SERVER_VERSION } from './mcp.js';
export { startStdioServer } from './stdio.js';
