// ============================================================================
// JSON Schema Fragments
// ============================================================================
// Reused pieces of MCP inputSchema definitions. These mirror the zod
// fragments in validation.ts.
// ============================================================================

export const LIST_PROPERTIES: Record<string, unknown> = {
  page_size: {
    type: 'integer',
    minimum: 1,
    maximum: 200,
    description: 'Number of items per page (AWX default: 25)',
  },
  page: {
    type: 'integer',
    minimum: 1,
    description: 'Page number, starting at 1',
  },
  search: {
    type: 'string',
    description: 'Free-text search across the resource fields',
  },
  order_by: {
    type: 'string',
    description: 'Field to sort by, prefix with "-" for descending (e.g. "-id")',
  },
  all_pages: {
    type: 'boolean',
    description: 'Follow pagination and return every result (default: false)',
  },
};

export function idProperty(resource: string): Record<string, unknown> {
  return {
    type: 'integer',
    minimum: 1,
    description: `ID of the ${resource}`,
  };
}
