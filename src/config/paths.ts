/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.tsrr/            (or $TSRR_HOME)
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

/**
 * Get the tsrr directory path ($TSRR_HOME, else ~/.tsrr)
 */
export function getTsrrDir(): string {
  return getEnv('TSRR_HOME') ?? join(homedir(), '.tsrr');
}

/**
 * Get the config file path (<tsrr dir>/config.toml)
 */
export function getConfigPath(): string {
  return join(getTsrrDir(), 'config.toml');
}
