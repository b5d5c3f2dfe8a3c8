/**
 * Document Schema
 *
 * Zod schemas for corpus documents. The corpus is stored as two files:
 * `database.json` (metadata records) and `abstracts.json` (abstract strings
 * aligned with the records by position).
 *
 * @module schemas/document
 */

import { z } from 'zod';
import { YearSchema, AuthorListSchema } from './common.js';

// ============================================================================
// Record Schemas (on-disk shape)
// ============================================================================

/**
 * DocumentRecord: one entry of database.json, everything but the abstract.
 */
export const DocumentRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  year: YearSchema,
  authors: AuthorListSchema,
  journal: z.string().optional(),
  doi: z.string().optional(),
  url: z.string().optional(),
});

export type DocumentRecord = z.infer<typeof DocumentRecordSchema>;

export const DocumentRecordListSchema = z.array(DocumentRecordSchema);

/**
 * abstracts.json: one abstract per database record, same order.
 */
export const AbstractListSchema = z.array(z.string());

// ============================================================================
// Document Schema
// ============================================================================

/**
 * Document: a corpus entry. Title is the natural key for matching.
 */
export const DocumentSchema = DocumentRecordSchema.extend({
  abstract: z.string(),
});

export type Document = z.infer<typeof DocumentSchema>;
