/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions.
 */

// ============================================================================
// Common Types
// ============================================================================

export {
  YearSchema,
  YearRangeSchema,
  AuthorListSchema,
  type Year,
  type YearRange,
  type AuthorList,
} from './common.js';

// ============================================================================
// Corpus Documents
// ============================================================================

export {
  DocumentRecordSchema,
  DocumentRecordListSchema,
  AbstractListSchema,
  DocumentSchema,
  type DocumentRecord,
  type Document,
} from './document.js';

// ============================================================================
// User Library
// ============================================================================

export {
  UserLibraryEntrySchema,
  LibraryFileSchema,
  type UserLibraryEntry,
} from './library.js';

// ============================================================================
// Recommendations
// ============================================================================

export {
  ScoreSchema,
  RecommendationSchema,
  type Recommendation,
} from './recommendation.js';
