/**
 * Environment Variable Handler Tests
 *
 * Tests for src/config/env.ts
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, hasApiKey, getOllamaHost, _clearEnvCache, SETUP_INSTRUCTIONS } from '../env.js';

/** Blank out every variable the loader reads, so the host shell cannot leak in */
function clearProviderEnv(): void {
  for (const name of ['OPENAI_API_KEY', 'OLLAMA_HOST', 'OPENAI_COMPATIBLE_API_KEY', 'OPENAI_COMPATIBLE_BASE_URL']) {
    vi.stubEnv(name, '');
  }
}

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    clearProviderEnv();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('loads OPENAI_API_KEY when set', () => {
      vi.stubEnv('OPENAI_API_KEY', 'sk-test-openai-key');

      const env = loadEnv();

      expect(env.OPENAI_API_KEY).toBe('sk-test-openai-key');
    });

    it('returns undefined for missing optional keys', () => {
      const env = loadEnv();

      expect(env.OPENAI_API_KEY).toBeUndefined();
      expect(env.OPENAI_COMPATIBLE_API_KEY).toBeUndefined();
      expect(env.OPENAI_COMPATIBLE_BASE_URL).toBeUndefined();
    });

    it('provides default OLLAMA_HOST when not set', () => {
      expect(loadEnv().OLLAMA_HOST).toBe('http://localhost:11434');
    });

    it('uses custom OLLAMA_HOST when set', () => {
      vi.stubEnv('OLLAMA_HOST', 'http://192.168.1.100:11434');

      expect(loadEnv().OLLAMA_HOST).toBe('http://192.168.1.100:11434');
    });

    it('caches environment variables after first load', () => {
      vi.stubEnv('OPENAI_API_KEY', 'initial-value');
      loadEnv();

      vi.stubEnv('OPENAI_API_KEY', 'changed-value');

      expect(loadEnv().OPENAI_API_KEY).toBe('initial-value');
    });

    it('returns fresh values after cache is cleared', () => {
      vi.stubEnv('OPENAI_API_KEY', 'initial-value');
      loadEnv();

      _clearEnvCache();
      vi.stubEnv('OPENAI_API_KEY', 'new-value');

      expect(loadEnv().OPENAI_API_KEY).toBe('new-value');
    });
  });

  describe('getEnv()', () => {
    it('returns the value for a specific key', () => {
      vi.stubEnv('OPENAI_COMPATIBLE_BASE_URL', 'https://llm.example.com/v1');

      expect(getEnv('OPENAI_COMPATIBLE_BASE_URL')).toBe('https://llm.example.com/v1');
    });

    it('returns undefined for unset optional keys', () => {
      expect(getEnv('OPENAI_COMPATIBLE_API_KEY')).toBeUndefined();
    });
  });

  describe('hasApiKey()', () => {
    it('returns true when the openai key exists', () => {
      vi.stubEnv('OPENAI_API_KEY', 'sk-test');

      expect(hasApiKey('openai')).toBe(true);
    });

    it('returns true when the compatible-server key exists', () => {
      vi.stubEnv('OPENAI_COMPATIBLE_API_KEY', 'test-secret');

      expect(hasApiKey('openai-compatible')).toBe(true);
    });

    it('returns false when keys are missing', () => {
      expect(hasApiKey('openai')).toBe(false);
      expect(hasApiKey('openai-compatible')).toBe(false);
    });

    it('returns false when key is only whitespace', () => {
      vi.stubEnv('OPENAI_API_KEY', '   ');

      expect(hasApiKey('openai')).toBe(false);
    });
  });

  describe('getOllamaHost()', () => {
    it('returns default host when not configured', () => {
      expect(getOllamaHost()).toBe('http://localhost:11434');
    });

    it('returns custom host when configured', () => {
      vi.stubEnv('OLLAMA_HOST', 'https://ollama.example.com');

      expect(getOllamaHost()).toBe('https://ollama.example.com');
    });
  });
});

describe('SETUP_INSTRUCTIONS', () => {
  it('names the variables each provider needs', () => {
    expect(SETUP_INSTRUCTIONS.openai).toContain('OPENAI_API_KEY');
    expect(SETUP_INSTRUCTIONS.ollama).toContain('OLLAMA_HOST');
    expect(SETUP_INSTRUCTIONS['openai-compatible']).toContain('OPENAI_COMPATIBLE_BASE_URL');
  });
});
