import { z } from 'zod';
import { createLogger } from '../services/logger';

/**
 * Lenient validation helpers: keep Zod type checking on remote responses and
 * on files we do not own, but hand back a fallback instead of throwing.
 */

const logger = createLogger('validation');

const formatIssues = (issues: z.ZodIssue[]): string[] =>
  issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);

/**
 * Safely parses data with a Zod schema, returning fallback on validation failure.
 * The failure is logged at warn level together with the context.
 *
 * @param context - Where the data came from (e.g., "GET /api/tonieboxes")
 *
 * @example
 * const boxes = safeParse(BoxListSchema, response.data, [], 'GET /api/tonieboxes');
 */
export function safeParse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  fallback: T,
  context: string
): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    logger.warn(`${context}: unexpected shape`, {
      issues: formatIssues(result.error.issues),
    });
    return fallback;
  }

  return result.data;
}

/**
 * Safely parses data as an array, validating each item on its own.
 * Invalid items are dropped and reported; valid ones are kept.
 * Anything that is not an array yields an empty array.
 */
export function safeParseArray<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T[] {
  if (data === null || data === undefined) {
    logger.warn(`${context}: received null/undefined, expected array`);
    return [];
  }
  if (!Array.isArray(data)) {
    logger.warn(`${context}: expected array, received ${typeof data}`);
    return [];
  }

  const items: T[] = [];
  const dropped: string[] = [];
  data.forEach((item: unknown, index) => {
    const result = schema.safeParse(item);
    if (result.success) {
      items.push(result.data);
    } else {
      dropped.push(`[${index}] ${formatIssues(result.error.issues).join(', ')}`);
    }
  });

  if (dropped.length > 0) {
    logger.warn(`${context}: skipped ${dropped.length} invalid item(s)`, { issues: dropped });
  }
  return items;
}
