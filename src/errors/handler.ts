/**
 * Error handler for CLI error formatting and display
 *
 * This module provides:
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode for debugging with stack traces
 */

import chalk from 'chalk';
import { CLIError } from './types.js';
import { TsrrError } from '../eval/errors.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  /** TsrrError code, when the failure came from the scoring library */
  reason?: string;
  hint?: string;
  stack?: string;
}

/**
 * Hint shown for scoring errors, keyed by TsrrError code.
 */
const TSRR_HINTS: Partial<Record<TsrrError['code'], string>> = {
  SHAPE_MISMATCH: 'A single target needs one flat list of results and one of similarities',
  DIMENSION_MISMATCH: 'A list of targets needs one row of results and similarities per target',
  ROW_COUNT_MISMATCH: 'Add or remove rows so every target has exactly one',
  ROW_LENGTH_MISMATCH: 'Each results row must have one similarity per candidate',
  INVALID_SIMILARITY: 'Similarities must be finite numbers',
  DATASET_INVALID: 'Check the dataset file against the documented format',
};

function stackLines(stack: string | undefined): string[] {
  if (!stack) return [];
  return ['', chalk.dim('Stack trace:'), chalk.dim(stack)];
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: error.code,
        hint: error.hint,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [chalk.red('Error: ') + error.message];
    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }
    if (verbose) {
      lines.push(...stackLines(error.stack));
    }
    return lines.join('\n');
  }

  if (error instanceof TsrrError) {
    const hint = TSRR_HINTS[error.code];
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        reason: error.code,
        hint,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [chalk.red('Error: ') + error.message];
    if (hint) {
      lines.push(chalk.dim('Hint: ') + hint);
    }
    if (verbose) {
      lines.push(...stackLines(error.stack));
    }
    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [chalk.red('Error: ') + error.message];
    if (verbose) {
      lines.push(...stackLines(error.stack));
    } else {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }
    return lines.join('\n');
  }

  // Strings, numbers and other thrown values
  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Handle an error by formatting and exiting.
 *
 * This is the main entry point for error handling.
 * It formats the error, writes it to stderr, and exits with the appropriate code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a global error handler that can be attached to process events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
