/**
 * Test Utilities - Unified Reset
 *
 * Clears process-wide caches so each test starts from a clean slate.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/env.js';

/**
 * Reset all application caches for test isolation.
 *
 * Currently this is the parsed environment, which is read once per process.
 */
export function resetAll(): void {
  _clearEnvCache();
}
