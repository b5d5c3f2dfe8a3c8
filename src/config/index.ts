/**
 * Configuration Module
 *
 * Loads and validates environment variables for the bibliographic recommender.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { getCorpusDir, getDataDir } from '../storage/paths.js';

// Environment schema with optional values and defaults
export const envSchema = z.object({
  // Data locations
  BIBREC_DATA_DIR: z.string().optional(),
  BIBREC_CORPUS_DIR: z.string().optional(),

  // Engine limits
  BIBREC_SUGGESTIONS_PER_PAPER: z.coerce.number().int().positive().default(100),
  BIBREC_KEYWORDS_PER_PAPER: z.coerce.number().int().positive().default(20),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Build the configuration object from validated environment values.
 */
export function buildConfig(env: Env) {
  const dataDir = getDataDir(env.BIBREC_DATA_DIR);

  return {
    // Data directories
    dataDir,
    corpusDir: getCorpusDir(dataDir, env.BIBREC_CORPUS_DIR),

    // Candidates retrieved per library entry (K) and keywords extracted per entry
    limits: {
      suggestionsPerPaper: env.BIBREC_SUGGESTIONS_PER_PAPER,
      keywordsPerPaper: env.BIBREC_KEYWORDS_PER_PAPER,
    },
  } as const;
}

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * Application configuration singleton
 */
export const config = buildConfig(parseResult.data);

// Re-export types
export type Config = ReturnType<typeof buildConfig>;
