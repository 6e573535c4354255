/**
 * API Key Validators
 *
 * Validates API key and host formats without exposing key values.
 * These functions never log or return the actual key; only
 * getProviderCredentials() hands it to a client constructor.
 */

import { z } from 'zod';
import { getEnv, getOllamaHost, hasApiKey, SETUP_INSTRUCTIONS } from '../config/env.js';
import type { ProviderType } from '../config/schema.js';
import { APIKeyError, ConfigError } from '../errors/index.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * When valid: { valid: true }
 * When invalid: { valid: false, error, setupInstructions }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

// ============================================================================
// FORMAT VALIDATORS (Zod schemas)
// ============================================================================

/**
 * OpenAI keys all start with "sk-" (legacy, sk-proj-, sk-svcacct-).
 */
export const OpenAIKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => key.startsWith('sk-'),
    'Invalid OpenAI API key format (should start with "sk-")'
  );

/**
 * HTTP(S) base URL for Ollama or an OpenAI-compatible server.
 */
export const HostUrlSchema = z
  .string()
  .url('Invalid host URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Host must be an HTTP(S) URL'
  );

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

export function validateOpenAIKey(): ValidationResult {
  const key = getEnv('OPENAI_API_KEY');
  if (!hasApiKey('openai') || key === undefined) {
    return {
      valid: false,
      error: 'OPENAI_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS.openai,
    };
  }

  const result = OpenAIKeySchema.safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS.openai,
    };
  }

  return { valid: true };
}

/**
 * Validate a host URL (Ollama or OpenAI-compatible base URL).
 */
export function validateHostUrl(
  host: string,
  provider: 'ollama' | 'openai-compatible' = 'ollama'
): ValidationResult {
  const result = HostUrlSchema.safeParse(host);
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid host URL',
      setupInstructions: SETUP_INSTRUCTIONS[provider],
    };
  }
  return { valid: true };
}

/**
 * OpenAI-compatible servers need both a key and a base URL. Key format is
 * server-specific, so only presence is checked.
 */
export function validateOpenAICompatible(): ValidationResult {
  if (!hasApiKey('openai-compatible')) {
    return {
      valid: false,
      error: 'OPENAI_COMPATIBLE_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS['openai-compatible'],
    };
  }

  const baseURL = getEnv('OPENAI_COMPATIBLE_BASE_URL');
  if (baseURL === undefined) {
    return {
      valid: false,
      error: 'OPENAI_COMPATIBLE_BASE_URL environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS['openai-compatible'],
    };
  }

  return validateHostUrl(baseURL, 'openai-compatible');
}

/**
 * Validate the credentials for a provider. Call before creating a client.
 *
 * @example
 * ```typescript
 * const result = validateProviderKey(config.generation.provider);
 * if (!result.valid) {
 *   ctx.error(result.error);
 *   ctx.log(result.setupInstructions);
 *   return;
 * }
 * ```
 */
export function validateProviderKey(provider: ProviderType): ValidationResult {
  switch (provider) {
    case 'openai':
      return validateOpenAIKey();
    case 'ollama':
      return validateHostUrl(getOllamaHost());
    case 'openai-compatible':
      return validateOpenAICompatible();
  }
}

// ============================================================================
// CLIENT CREDENTIALS
// ============================================================================

/**
 * What an OpenAI client needs to reach a back end.
 */
export interface ProviderCredentials {
  apiKey: string;
  baseURL?: string;
}

/**
 * Resolve validated credentials for a provider.
 *
 * Ollama ignores the key, but the client requires a non-empty one.
 *
 * @throws APIKeyError when a key is missing or malformed
 * @throws ConfigError when a host URL is malformed
 */
export function getProviderCredentials(provider: ProviderType): ProviderCredentials {
  const validation = validateProviderKey(provider);
  if (!validation.valid) {
    if (provider === 'ollama') {
      throw new ConfigError(validation.error, validation.setupInstructions);
    }
    throw new APIKeyError(
      provider,
      provider === 'openai' ? 'OPENAI_API_KEY' : 'OPENAI_COMPATIBLE_API_KEY'
    );
  }

  switch (provider) {
    case 'openai': {
      const apiKey = getEnv('OPENAI_API_KEY');
      if (apiKey === undefined) throw new APIKeyError('openai', 'OPENAI_API_KEY');
      return { apiKey };
    }
    case 'ollama':
      return {
        apiKey: 'ollama',
        baseURL: `${getOllamaHost().replace(/\/+$/, '')}/v1`,
      };
    case 'openai-compatible': {
      const apiKey = getEnv('OPENAI_COMPATIBLE_API_KEY');
      if (apiKey === undefined) {
        throw new APIKeyError('openai-compatible', 'OPENAI_COMPATIBLE_API_KEY');
      }
      return { apiKey, baseURL: getEnv('OPENAI_COMPATIBLE_BASE_URL') };
    }
  }
}
