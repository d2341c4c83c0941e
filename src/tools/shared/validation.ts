// ============================================================================
// Validation Helpers
// ============================================================================
// zod fragments shared by endpoint functions. Every failure surfaces as a
// ValidationFailure before any request is made.
// ============================================================================

import { z } from 'zod';
import { ToolError } from '../../awx/index.js';

/**
 * Parse tool input against a schema, throwing ValidationFailure with one
 * line per issue ("role_id: Required").
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.') || '(input)',
      message: issue.message,
    }));
    throw ToolError.validation(
      `Invalid parameters: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
      issues
    );
  }
  return result.data;
}

/** AWX primary key */
export const resourceId = z.number().int().positive();

/**
 * A string that must contain valid JSON (AWX stores variables, extra_vars
 * and credential inputs as JSON/YAML text).
 */
export const jsonText = z.string().refine(value => {
  try {
    JSON.parse(value);
    return true;
  } catch {
    return false;
  }
}, { message: 'Must be a valid JSON string' });

/**
 * Common list parameters. `all_pages` follows `next` links instead of
 * returning a single page.
 */
export const listParams = {
  page_size: z.number().int().min(1).max(200).optional(),
  page: z.number().int().min(1).optional(),
  search: z.string().min(1).optional(),
  order_by: z.string().min(1).optional(),
  all_pages: z.boolean().optional(),
};

const ListSchema = z.object(listParams);
export type ListInput = z.input<typeof ListSchema>;

/**
 * True when at least one of the given fields is present. Used by PATCH
 * schemas so an update never sends an empty body.
 */
export function hasAnyOf<T extends Record<string, unknown>>(
  value: T,
  fields: Array<keyof T & string>
): boolean {
  return fields.some(f => value[f] !== undefined);
}
