/**
 * Shared Command Options
 *
 * Validation of the options every query command accepts, and the mapping
 * from pipeline errors to exit codes.
 *
 * @module cli/commands/options
 */

import { z } from 'zod';
import { YearRangeSchema, YearSchema } from '../../schemas/common.js';
import { InputLoadError, MissingDependencyError } from '../../errors/index.js';
import { EXIT_CODES, type ExitCode } from '../base-command.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw option values as commander hands them over (strings).
 */
export interface RawQueryOptions {
  count?: string;
  since?: string;
  to?: string;
  keywords?: string;
  output?: string;
  library?: string;
}

// ============================================================================
// Schema
// ============================================================================

/**
 * Validated query options.
 */
export const QueryOptionsSchema = z
  .object({
    count: z.coerce.number().int().nonnegative().default(20),
    since: z.coerce.number().pipe(YearSchema).optional(),
    to: z.coerce.number().pipe(YearSchema).optional(),
    keywords: z.coerce.number().int().nonnegative().default(10),
    output: z.string().min(1).optional(),
    library: z.string().min(1).optional(),
  })
  .superRefine((options, ctx) => {
    const range = YearRangeSchema.safeParse({ since: options.since, to: options.to });
    if (!range.success) {
      for (const issue of range.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
      }
    }
  });

export type QueryOptions = z.infer<typeof QueryOptionsSchema>;

/**
 * Thrown when command options fail validation.
 */
export class OptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OptionsError';
  }
}

/**
 * Validate raw command options.
 *
 * @param raw - Options from commander
 * @returns Typed options with defaults applied
 * @throws OptionsError naming the first invalid option
 */
export function parseQueryOptions(raw: RawQueryOptions): QueryOptions {
  const result = QueryOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue.path.length > 0 ? `--${issue.path.join('.')}` : 'options';
    throw new OptionsError(`Invalid ${option}: ${issue.message}`);
  }
  return result.data;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Map an error raised while running a command to its exit code.
 * Inconsistent corpus data and anything unexpected exit with ERROR.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof OptionsError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof MissingDependencyError || error instanceof InputLoadError) {
    return EXIT_CODES.NOT_FOUND;
  }
  return EXIT_CODES.ERROR;
}
