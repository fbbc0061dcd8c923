/**
 * Logger Interface for Library Code
 *
 * Library functions such as tsrr() accept a Logger via their options
 * instead of writing to the console directly. The CLI passes its
 * CommandContext (which satisfies Logger), tests pass silentLogger or a
 * spy, and everyone else gets consoleLogger.
 */

/**
 * Generic logger interface for library code
 *
 * Compatible with CommandContext so the CLI can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default logger used when none is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.debug(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
