/**
 * Recommendation CSV Export
 *
 * Writes a RecommendationSet as a CSV table (one row per document, including
 * the score column) and reads it back. Scores are written with full
 * precision, so a save/load round trip preserves them exactly.
 *
 * @module storage/recommendations
 */

import * as fs from 'node:fs/promises';
import Papa from 'papaparse';
import { z } from 'zod';
import { RecommendationSet } from '../ranking/recommendation-set.js';
import type { Recommendation } from '../schemas/recommendation.js';
import { ScoreSchema } from '../schemas/recommendation.js';
import { atomicWriteFile } from './atomic.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Column order of the exported table.
 */
export const CSV_COLUMNS = [
  'rank',
  'id',
  'title',
  'year',
  'authors',
  'journal',
  'doi',
  'url',
  'score',
  'abstract',
] as const;

/** Separator used to join author names in a single cell */
const AUTHOR_SEPARATOR = '; ';

// ============================================================================
// Row Schema
// ============================================================================

const optionalCell = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

/**
 * One parsed CSV row.
 */
const CsvRowSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  year: z.coerce.number().int().nonnegative(),
  authors: z
    .string()
    .default('')
    .transform((cell) => (cell.length > 0 ? cell.split(AUTHOR_SEPARATOR) : [])),
  journal: optionalCell,
  doi: optionalCell,
  url: optionalCell,
  score: z.coerce.number().pipe(ScoreSchema),
  abstract: z.string().default(''),
});

// ============================================================================
// Formatting
// ============================================================================

/**
 * Render recommendations as CSV text.
 *
 * @param rows - Recommendations in display order
 * @returns CSV with a header row, without a trailing line break
 */
export function formatRecommendationsCsv(rows: readonly Recommendation[]): string {
  const csv = Papa.unparse({
    fields: [...CSV_COLUMNS],
    data: rows.map((row, index) => [
      index + 1,
      row.id,
      row.title,
      row.year,
      row.authors.join(AUTHOR_SEPARATOR),
      row.journal ?? '',
      row.doi ?? '',
      row.url ?? '',
      row.score,
      row.abstract,
    ]),
  });
  // unparse ends a header-only table with a line break
  return csv.replace(/(?:\r\n)+$/, '');
}

/**
 * Parse CSV text produced by formatRecommendationsCsv.
 *
 * @param csv - CSV text
 * @returns Recommendations in file order
 * @throws Error if the CSV is malformed or a row fails validation
 */
export function parseRecommendationsCsv(csv: string): Recommendation[] {
  const parsed = Papa.parse<Record<string, string>>(csv, {
    header: true,
    skipEmptyLines: true,
  });

  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new Error(`Malformed recommendations CSV (row ${first.row}): ${first.message}`);
  }

  return parsed.data.map((raw, index) => {
    const result = CsvRowSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new Error(
        `Invalid recommendation at row ${index + 1}: ${issue.path.join('.')} ${issue.message}`
      );
    }
    return result.data;
  });
}

// ============================================================================
// File I/O
// ============================================================================

/**
 * Save recommendations to a CSV file.
 *
 * @param recommendations - Final recommendation set
 * @param filePath - Target path; parent directories are created
 */
export async function saveRecommendationsCsv(
  recommendations: RecommendationSet,
  filePath: string
): Promise<void> {
  await atomicWriteFile(filePath, formatRecommendationsCsv(recommendations.toArray()));
}

/**
 * Load recommendations saved by saveRecommendationsCsv.
 *
 * @param filePath - CSV file path
 */
export async function loadRecommendationsCsv(filePath: string): Promise<RecommendationSet> {
  const csv = await fs.readFile(filePath, 'utf-8');
  return RecommendationSet.fromRows(parseRecommendationsCsv(csv));
}
