/**
 * Common Zod Schemas - Shared types used across the engine
 */

import { z } from 'zod';

// ============================================
// Year Schemas
// ============================================

/**
 * Publication year. Integer, no calendar bounds beyond being non-negative.
 */
export const YearSchema = z.number().int().nonnegative();

export type Year = z.infer<typeof YearSchema>;

/**
 * YearRange is an inclusive publication-year window.
 * Either bound may be omitted; an omitted bound imposes no constraint.
 */
export const YearRangeSchema = z
  .object({
    since: YearSchema.optional(),
    to: YearSchema.optional(),
  })
  .refine(
    (data) => data.since === undefined || data.to === undefined || data.since <= data.to,
    {
      message: '"since" year must be before or equal to "to" year',
      path: ['to'],
    }
  );

export type YearRange = z.infer<typeof YearRangeSchema>;

// ============================================
// Author Schema
// ============================================

/**
 * Author names as they appear in the source record.
 * Matching always goes through normalizeAuthorName (engine/authors).
 */
export const AuthorListSchema = z.array(z.string().min(1));

export type AuthorList = z.infer<typeof AuthorListSchema>;
