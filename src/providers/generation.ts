/**
 * Text-Generation Service
 *
 * Factory that creates a GenerationService over the OpenAI chat
 * completions API. The same client reaches OpenAI, a local Ollama server
 * (through its /v1 endpoint) or any OpenAI-compatible server.
 *
 * The API key is resolved only after validation passes and is never
 * logged.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type { ProviderType } from '../config/schema.js';
import type { ChatMessage, GenerationRequest, GenerationService } from './types.js';
import { getProviderCredentials } from './validation.js';

// ============================================================================
// TYPES
// ============================================================================

export interface GenerationServiceOptions {
  provider: ProviderType;
  /** Chat model name */
  model: string;
  /** @default 0 */
  temperature?: number;
  /** @default 1024 */
  maxTokens?: number;
  /** Client-side request timeout in milliseconds */
  timeout?: number;
  /** Transport retries performed by the client inside one generate() call */
  maxRetries?: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_GENERATION_MODEL = 'gpt-4o-mini';

// ============================================================================
// FACTORY
// ============================================================================

function toOpenAIMessage(msg: ChatMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'assistant':
      return { role: 'assistant', content: msg.content };
  }
}

/**
 * Create a configured generation service.
 *
 * @throws APIKeyError if the provider's key is missing or malformed
 *
 * @example
 * ```typescript
 * const service = createGenerationService({
 *   provider: config.generation.provider,
 *   model: config.generation.model,
 *   timeout: config.generation.timeout_ms,
 * });
 * const text = await service.generate({ messages: [{ role: 'user', content: 'Hi' }] });
 * ```
 */
export function createGenerationService(options: GenerationServiceOptions): GenerationService {
  const { apiKey, baseURL } = getProviderCredentials(options.provider);
  const model = options.model || DEFAULT_GENERATION_MODEL;
  const temperature = options.temperature ?? 0;
  const maxTokens = options.maxTokens ?? 1024;

  const client = new OpenAI({
    apiKey,
    baseURL,
    timeout: options.timeout,
    maxRetries: options.maxRetries,
  });

  return {
    name: options.provider,
    model,

    async generate(request: GenerationRequest): Promise<string> {
      const response = await client.chat.completions.create(
        {
          model,
          messages: request.messages.map(toOpenAIMessage),
          temperature: request.temperature ?? temperature,
          max_tokens: request.maxTokens ?? maxTokens,
          stream: false,
        },
        { signal: request.signal }
      );

      return response.choices[0]?.message.content ?? '';
    },
  };
}
