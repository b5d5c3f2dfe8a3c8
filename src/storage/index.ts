/**
 * Storage Layer
 *
 * File operations, path resolution and recommendation export.
 *
 * @module storage
 */

// Atomic operations
export { atomicWriteFile, readJson, fileExists, isErrnoException } from './atomic.js';

// Path utilities
export {
  DATABASE_FILE,
  ABSTRACTS_FILE,
  resolveUserPath,
  getDataDir,
  getCorpusDir,
  getCorpusFilePath,
} from './paths.js';

// Recommendation export
export {
  CSV_COLUMNS,
  formatRecommendationsCsv,
  parseRecommendationsCsv,
  saveRecommendationsCsv,
  loadRecommendationsCsv,
} from './recommendations.js';
