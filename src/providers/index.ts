/**
 * Providers Module
 *
 * Generation and embedding services plus credential validation.
 *
 * MAIN ENTRY POINTS:
 * ```typescript
 * import { createGenerationService, createEmbeddingProvider } from './providers/index.js';
 * ```
 */

// ============================================================================
// SERVICE INTERFACES
// ============================================================================

export type {
  ChatRole,
  ChatMessage,
  GenerationRequest,
  GenerationService,
  EmbeddingResult,
  EmbeddingProvider,
} from './types.js';

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export {
  validateProviderKey,
  validateOpenAIKey,
  validateOpenAICompatible,
  validateHostUrl,
  getProviderCredentials,
  OpenAIKeySchema,
  HostUrlSchema,
  type ValidationResult,
  type ProviderCredentials,
} from './validation.js';

// ============================================================================
// FACTORIES
// ============================================================================

export {
  createGenerationService,
  DEFAULT_GENERATION_MODEL,
  type GenerationServiceOptions,
} from './generation.js';

export {
  createEmbeddingProvider,
  getModelDimensions,
  type EmbeddingProviderOptions,
} from './embedding.js';
