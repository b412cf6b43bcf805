/**
 * Configuration for SQL query execution limits
 * These limits bound how many rows a single query can ask for and return
 */

import { z } from "zod";

export const QueryLimitsSchema = z.object({
  /**
   * Maximum number of rows that can be returned by a query, or null for no cap
   * Results beyond this are dropped after sorting and LIMIT, and the result
   * is marked as truncated
   */
  maxRows: z.number().int().positive().nullable(),

  /**
   * Maximum LIMIT value allowed in queries
   */
  maxLimit: z.number().int().nonnegative(),

  /**
   * Enforce that every query must have a LIMIT clause
   */
  requireLimit: z.boolean(),

  /**
   * Tables that are exempt from requireLimit check
   * Useful for small lookup tables
   */
  exemptTables: z.array(z.string()),
});

export type QueryLimits = z.infer<typeof QueryLimitsSchema>;

/**
 * Default limits - results are never truncated, only LIMIT values are bounded
 */
export const DEFAULT_LIMITS: QueryLimits = {
  maxRows: null,
  maxLimit: 10000,
  requireLimit: false,
  exemptTables: [],
};

/**
 * Permissive limits - for large files loaded in development
 */
export const PERMISSIVE_LIMITS: QueryLimits = {
  maxRows: 100000,
  maxLimit: 100000,
  requireLimit: false,
  exemptTables: [],
};

/**
 * Strict limits - every query must page through results explicitly
 */
export const STRICT_LIMITS: QueryLimits = {
  maxRows: 100,
  maxLimit: 100,
  requireLimit: true,
  exemptTables: [],
};

/**
 * Merge overrides over DEFAULT_LIMITS and validate the result
 *
 * @throws ZodError if any limit is out of range
 */
export function resolveLimits(overrides: Partial<QueryLimits> = {}): QueryLimits {
  return QueryLimitsSchema.parse({ ...DEFAULT_LIMITS, ...overrides });
}
