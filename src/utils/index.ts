/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Table formatting for CLI output
export {
  formatTable,
  formatCell,
  type Column,
  type Alignment,
  type Cell,
  type Row,
  type TableOptions,
} from './table.js';

// Injectable logging for library code
export { consoleLogger, silentLogger, type Logger } from './logger.js';
