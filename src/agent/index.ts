/**
 * Agent Module
 *
 * Answers multiple-choice questions with an optional retrieval step:
 * 1. Retrieves corpus passages relevant to the question
 * 2. Composes a prompt with labelled choices and worked examples
 * 3. Calls the generation service once
 * 4. Extracts the chosen option from the free-form response
 *
 * @example
 * ```typescript
 * import { createAgentFromConfig } from './agent/index.js';
 * import { loadConfig } from './config/index.js';
 *
 * const { agent } = await createAgentFromConfig(loadConfig());
 * const index = await agent.getResponse('Which gas do plants absorb?', [
 *   'Oxygen', 'Carbon dioxide', 'Nitrogen', 'Helium',
 * ]);
 * // 1, or -1 when no choice could be determined
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Core
// ============================================================================

export {
  MultipleChoiceAgent,
  GenerationTimeoutError,
  isFatalAgentError,
  type AgentDeps,
  type AgentOptions,
  type ContextSource,
} from './agent.js';

export {
  createAgentFromConfig,
  createGenerationFromConfig,
  createEmbeddingFromConfig,
  loadCorpus,
  type CreateAgentOptions,
  type CreatedAgent,
  type CorpusSetup,
  type LoadCorpusOptions,
} from './factory.js';

// ============================================================================
// Prompt & Extraction
// ============================================================================

export {
  composePrompt,
  finalAnswerInstruction,
  SYSTEM_PROMPT,
  CONTEXT_HEADER,
  CONTEXT_FOOTER,
  type ComposePromptInput,
} from './prompt.js';

export {
  extractAnswer,
  extractAnswerIndex,
  normalizeText,
  diceSimilarity,
  DEFAULT_FUZZY_THRESHOLD,
  MAX_RESPONSE_CHARS,
  type ExtractOptions,
} from './extractor.js';

export { CHOICE_LABELS, MAX_CHOICES, labelForIndex, indexForLabel, labelsFor } from './labels.js';

export { DEFAULT_EXEMPLARS, loadExemplars, resolveExemplars } from './exemplars.js';

// ============================================================================
// Types & Schemas
// ============================================================================

export {
  RAGConfigSchema,
  PromptConfigSchema,
  ExtractionConfigSchema,
  ReasoningModeSchema,
  NumberingSchema,
  ExemplarSchema,
  NO_MATCH,
} from './types.js';

export type {
  RAGConfig,
  PromptConfig,
  ExtractionConfig,
  ReasoningMode,
  Numbering,
  Exemplar,
  Prompt,
  ExtractionStrategy,
  ExtractionResult,
  AnswerOutcome,
  AnswerTimings,
  AgentAnswer,
  MultipleChoiceResponder,
} from './types.js';
