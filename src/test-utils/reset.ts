/**
 * Test Utilities - Unified Reset
 *
 * Resets module-level caches so each test sees the environment it sets up.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../../test-utils/index.js';
 *
 * beforeEach(() => {
 *   process.env.TSRR_HOME = tempDir;
 *   resetAll();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/env.js';

/**
 * Reset all cached state for test isolation.
 *
 * Call after changing process.env so the next config lookup re-reads it.
 */
export function resetAll(): void {
  _clearEnvCache();
}
