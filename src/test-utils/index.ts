/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createRng, randomRow } from '../../test-utils/index.js';
 *
 * const rng = createRng(42);
 * const row = randomRow(rng, { levels: 3 });
 * ```
 */

export { resetAll } from './reset.js';
export { createRng, randomRow, shuffleRow, type RandomRowOptions } from './rows.js';
