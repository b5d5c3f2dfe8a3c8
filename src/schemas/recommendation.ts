/**
 * Recommendation Schema
 *
 * A recommended document carries a normalized score in (0, 1].
 *
 * @module schemas/recommendation
 */

import { z } from 'zod';
import { DocumentSchema } from './document.js';

export const ScoreSchema = z.number().gt(0).lte(1);

/**
 * Recommendation: a corpus document plus its aggregate score.
 */
export const RecommendationSchema = DocumentSchema.extend({
  score: ScoreSchema,
});

export type Recommendation = z.infer<typeof RecommendationSchema>;
