/**
 * Environment Variable Handler
 *
 * Loads and provides access to provider API keys and hosts.
 * Supports .env files for local development via dotenv.
 *
 * Keys are never logged and never included in error messages; only their
 * presence and format validity are reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Keys are optional at load time; each provider checks its own key on use.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
  OPENAI_COMPATIBLE_API_KEY: z.string().optional(),
  OPENAI_COMPATIBLE_BASE_URL: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Loaded once at first access; reset with _clearEnvCache() in tests */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  // Empty strings count as unset
  const read = (name: string): string | undefined => {
    const value = process.env[name];
    return value && value.trim() !== '' ? value : undefined;
  };

  _envCache = EnvSchema.parse({
    OPENAI_API_KEY: read('OPENAI_API_KEY'),
    OLLAMA_HOST: read('OLLAMA_HOST'),
    OPENAI_COMPATIBLE_API_KEY: read('OPENAI_COMPATIBLE_API_KEY'),
    OPENAI_COMPATIBLE_BASE_URL: read('OPENAI_COMPATIBLE_BASE_URL'),
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if an API key is configured (non-empty) without exposing it.
 */
export function hasApiKey(provider: 'openai' | 'openai-compatible'): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'openai':
      return Boolean(env.OPENAI_API_KEY?.trim());
    case 'openai-compatible':
      return Boolean(env.OPENAI_COMPATIBLE_API_KEY?.trim());
  }
}

/**
 * Get the Ollama host URL (default http://localhost:11434).
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Provider-specific setup instructions, shown when a key or host is missing.
 */
export const SETUP_INSTRUCTIONS: Record<'openai' | 'ollama' | 'openai-compatible', string> = {
  openai: `
To use OpenAI models:

1. Get your API key from https://platform.openai.com/api-keys
2. Set the environment variable (or add it to .env):

   export OPENAI_API_KEY="sk-..."
`.trim(),

  ollama: `
To use Ollama (local models):

1. Install Ollama from https://ollama.com/ and start it:

   ollama serve

2. Pull the chat and embedding models named in ~/.mcq/config.toml
3. (Optional) Set a custom host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),

  'openai-compatible': `
To use an OpenAI-compatible server:

1. Set the environment variables (or add them to .env):

   OPENAI_COMPATIBLE_API_KEY="your-api-key"
   OPENAI_COMPATIBLE_BASE_URL="https://api.example.com/v1"

2. Set the model names with: mcq config set generation.model <name>
`.trim(),
};
