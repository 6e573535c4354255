/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { resetAll, StubGenerationService } from '../../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export {
  StubGenerationService,
  createHangingGenerationService,
  createHashEmbeddingProvider,
  hashEmbed,
  type ScriptedReply,
  type HashEmbeddingOptions,
  type StubEmbeddingProvider,
} from './stubs.js';
