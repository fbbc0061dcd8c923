/**
 * Error type definitions for the tsrr CLI
 *
 * These custom error classes carry:
 * - A recovery hint shown under the message
 * - An exit code for scripts that wrap the CLI
 *
 * Library-level scoring failures use TsrrError (src/eval/errors.ts);
 * the classes here describe problems the CLI user can act on.
 */

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a dataset or config file doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Values outside their allowed range
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: tsrr config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when command-line input fails validation.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown by `tsrr score --check` when the mean score misses its threshold.
 *
 * Exit code 4: Threshold not met
 */
export class ThresholdError extends CLIError {
  public readonly actual: number;
  public readonly threshold: number;

  constructor(actual: number, threshold: number) {
    super(
      `Mean TsRR ${actual.toFixed(4)} is below the threshold ${threshold}`,
      'Lower thresholds.tsrr or pass --threshold <n>',
      4
    );
    this.name = 'ThresholdError';
    this.actual = actual;
    this.threshold = threshold;
  }
}
