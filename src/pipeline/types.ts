/**
 * Pipeline Type Definitions
 *
 * Contracts shared by the recommendation pipeline and the ranking engine:
 * the logger and progress observer passed into each stage, the collaborator
 * interfaces, and the non-fatal warnings collected while a query runs.
 *
 * @module pipeline/types
 */

import type { Document } from '../schemas/document.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Progress Reporting
// ============================================================================

/**
 * Observer notified between sequential pipeline steps.
 * Carries no correctness obligations; the engine runs the same without one.
 */
export interface ProgressReporter {
  /** A new named step has started */
  stage(label: string): void;

  /** `completed` of `total` units of the current step are done */
  advance(completed: number, total: number): void;

  /** The pipeline has finished (successfully or not) */
  done(): void;
}

/**
 * Reporter that ignores every notification.
 */
export const NOOP_PROGRESS: ProgressReporter = {
  stage: () => undefined,
  advance: () => undefined,
  done: () => undefined,
};

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Maps a text to an ordered list of up to `limit` corpus document ids,
 * best match first. An empty list means "no match", never an error.
 */
export interface CandidateRetriever {
  predict(text: string, limit: number): string[];
}

/**
 * Extracts up to `limit` keywords from a text, most representative first.
 */
export interface KeywordExtractor {
  extract(text: string, limit: number): string[];
}

/**
 * The loaded, read-only corpus.
 */
export interface Corpus {
  /** Documents in storage order */
  readonly documents: readonly Document[];

  /** Lookup by document id */
  readonly byId: ReadonlyMap<string, Document>;
}

// ============================================================================
// Warnings
// ============================================================================

/**
 * Non-fatal empty-result conditions. Logged and returned, never thrown.
 */
export type EmptyResultWarning =
  | {
      kind: 'no_candidates';
      /** Label of the query (library title, "query" or author list) */
      query: string;
    }
  | {
      kind: 'no_recommendations';
    };

// ============================================================================
// Stage Options
// ============================================================================

/**
 * Observability hooks accepted by every engine stage.
 */
export interface StageHooks {
  logger?: Logger;
  progress?: ProgressReporter;
  /** Collector for non-fatal warnings */
  warnings?: EmptyResultWarning[];
}
