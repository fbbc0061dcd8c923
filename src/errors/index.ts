/**
 * Error handling module for the tsrr CLI
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: tsrr config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
  ThresholdError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
