/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for long-running operations
 * - A ProgressReporter that drives the spinner from pipeline notifications
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { ProgressReporter } from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Render even when stdout is not a TTY */
  enabled?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading corpus...');
 * spinner.start();
 *
 * try {
 *   const corpus = await loadCorpus(dir);
 *   spinner.succeed(`Loaded ${corpus.documents.length} documents`);
 * } catch (err) {
 *   spinner.fail('Failed to load corpus');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  /**
   * Create a new progress spinner.
   *
   * @param text - Initial spinner text
   * @param options - Spinner options
   */
  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: 'cyan',
      isEnabled: options.enabled ?? process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  /**
   * Start the spinner.
   *
   * @param text - Optional text to display
   */
  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Update spinner text.
   *
   * @param text - New text to display
   */
  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state.
   *
   * @param text - Success message
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  /**
   * Stop spinner with failure state.
   *
   * @param text - Failure message
   */
  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

// ============================================================================
// Pipeline Progress
// ============================================================================

/**
 * ProgressReporter that shows the current pipeline step on a spinner.
 *
 * Each `stage` call completes the previous step and starts the next;
 * `advance` appends a `completed/total` counter to the step label.
 */
export class SpinnerProgressReporter implements ProgressReporter {
  private current: string | null = null;

  constructor(private readonly spinner: ProgressSpinner) {}

  stage(label: string): void {
    if (this.current !== null) {
      this.spinner.succeed(this.current);
    }
    this.current = label;
    this.spinner.start(`${label}...`);
  }

  advance(completed: number, total: number): void {
    if (this.current !== null) {
      this.spinner.update(`${this.current}... (${completed}/${total})`);
    }
  }

  done(): void {
    if (this.current !== null) {
      this.spinner.succeed(this.current);
      this.current = null;
    }
  }

  /**
   * Stop on failure, marking the step that was running.
   */
  fail(): void {
    if (this.current !== null) {
      this.spinner.fail(`${this.current} failed`);
      this.current = null;
    }
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @param ms - Duration in milliseconds
 * @returns Formatted duration string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
