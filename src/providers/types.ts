/**
 * Provider Types
 *
 * The two external services the agent depends on. Everything above this
 * layer talks to these interfaces, so tests can swap in in-process stubs.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * One text-generation request.
 */
export interface GenerationRequest {
  messages: readonly ChatMessage[];
  /** Overrides the service's configured temperature */
  temperature?: number;
  /** Overrides the service's configured max_tokens */
  maxTokens?: number;
  /** Aborts the in-flight request (used for the per-question deadline) */
  signal?: AbortSignal;
}

/**
 * A text-generation service: messages in, completion text out.
 *
 * Implementations reject on transport failure; callers decide what a
 * failure means.
 */
export interface GenerationService {
  readonly name: string;
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}

export interface EmbeddingResult {
  embedding: number[];
  model: string;
}

/**
 * An embedding model. Both the corpus and every query must go through
 * the same provider so vectors are comparable.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  /** Vector size when known up front */
  readonly dimensions?: number;
  embed(text: string): Promise<EmbeddingResult>;
  embedBatch(texts: string[]): Promise<EmbeddingResult[]>;
}
