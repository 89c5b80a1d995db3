import { z } from 'zod';
import { fromZodError } from './errors.js';
import { DEFAULT_LIMIT, DEFAULT_MIN_RATING } from './orchestrator.js';

export const productQuerySchema = z.object({
  query: z
    .string({ required_error: 'is required' })
    .trim()
    .min(2, 'must be at least 2 characters'),
  limit: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .min(1, 'must be between 1 and 100')
    .max(100, 'must be between 1 and 100')
    .default(DEFAULT_LIMIT),
  min_rating: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .min(0, 'must be between 0 and 5')
    .max(5, 'must be between 0 and 5')
    .default(DEFAULT_MIN_RATING)
});

export type ProductQuery = z.infer<typeof productQuerySchema>;

export const MAX_PAGE_COUNT = 20;

const pageCountSchema = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(1, `must be between 1 and ${MAX_PAGE_COUNT}`)
  .max(MAX_PAGE_COUNT, `must be between 1 and ${MAX_PAGE_COUNT}`);

function firstValue(value: unknown): unknown {
  const single = Array.isArray(value) ? value[0] : value;
  return single === '' ? undefined : single;
}

/**
 * Validate raw query-string style input. Throws a ValidationError naming the
 * offending parameter.
 */
export function parseProductQuery(input: Record<string, unknown>): ProductQuery {
  const parsed = productQuerySchema.safeParse({
    query: firstValue(input.query),
    limit: firstValue(input.limit),
    min_rating: firstValue(input.min_rating)
  });
  if (!parsed.success) {
    throw fromZodError(parsed.error);
  }
  return parsed.data;
}

/** Strictly parse a page count such as the CLI's `--pages` value. */
export function parsePageCount(value: string): number {
  const parsed = z.object({ pages: pageCountSchema }).safeParse({ pages: value.trim() === '' ? undefined : value });
  if (!parsed.success) {
    throw fromZodError(parsed.error);
  }
  return parsed.data.pages;
}
