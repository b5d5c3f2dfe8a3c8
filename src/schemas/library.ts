/**
 * User Library Schema
 *
 * Entries read from the user's bibliography. Only the title is required;
 * the abstract feeds retrieval and keyword extraction.
 *
 * @module schemas/library
 */

import { z } from 'zod';
import { YearSchema, AuthorListSchema } from './common.js';

/**
 * UserLibraryEntry: a document-like record supplied by the user.
 */
export const UserLibraryEntrySchema = z.object({
  /** BibTeX citation key, when the entry came from a .bib file */
  key: z.string().optional(),
  title: z.string().min(1),
  abstract: z.string().default(''),
  year: YearSchema.optional(),
  authors: AuthorListSchema.default([]),
});

export type UserLibraryEntry = z.infer<typeof UserLibraryEntrySchema>;

/**
 * A JSON library file: an array of entries.
 */
export const LibraryFileSchema = z.array(UserLibraryEntrySchema);
