/**
 * Agent Factory Tests
 *
 * Services are injected, so nothing here needs an API key.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { createAgentFromConfig, loadCorpus } from '../factory.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { Config } from '../../config/schema.js';
import { ConfigError } from '../../errors/index.js';
import { EmbeddingMismatchError } from '../../search/errors.js';
import { StubGenerationService, createHashEmbeddingProvider } from '../../test-utils/index.js';

const CORPUS =
  'Jupiter is the largest planet in the solar system.\n\n' +
  'Mercury is the planet closest to the Sun.\n\n' +
  'Water boils at one hundred degrees Celsius at sea level.';

let dir: string;
let corpusPath: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'mcq-factory-test-'));
  corpusPath = join(dir, 'corpus.txt');
  writeFileSync(corpusPath, CORPUS, 'utf-8');
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function testConfig(overrides: { corpusPath?: string; ragEnabled?: boolean } = {}): Config {
  return {
    ...DEFAULT_CONFIG,
    corpus: {
      ...DEFAULT_CONFIG.corpus,
      path: overrides.corpusPath ?? corpusPath,
      chunk_size: 60,
      chunk_overlap: 0,
      cache: false,
    },
    rag: { ...DEFAULT_CONFIG.rag, enabled: overrides.ragEnabled ?? true, min_score: 0 },
    prompt: { reasoning: 'direct', few_shot: false },
  };
}

describe('loadCorpus', () => {
  it('indexes the configured corpus file', async () => {
    const setup = await loadCorpus(testConfig(), createHashEmbeddingProvider());

    expect(setup.corpusPath).toBe(corpusPath);
    expect(setup.fromCache).toBe(false);
    expect(setup.index.chunks.map((c) => c.text)).toEqual([
      'Jupiter is the largest planet in the solar system.',
      'Mercury is the planet closest to the Sun.',
      'Water boils at one hundred degrees Celsius at sea level.',
    ]);
  });

  it('uses an explicit path over the configured one', async () => {
    const other = join(dir, 'other.txt');
    writeFileSync(other, 'Only one passage.', 'utf-8');

    const setup = await loadCorpus(testConfig(), createHashEmbeddingProvider(), { corpusPath: other });

    expect(setup.index.chunks).toHaveLength(1);
  });

  it('throws ConfigError for a missing corpus', async () => {
    const config = testConfig({ corpusPath: join(dir, 'missing.txt') });

    await expect(loadCorpus(config, createHashEmbeddingProvider())).rejects.toBeInstanceOf(ConfigError);
  });

  it('throws ConfigError for a blank corpus', async () => {
    writeFileSync(corpusPath, '  \n\n ', 'utf-8');

    await expect(loadCorpus(testConfig(), createHashEmbeddingProvider())).rejects.toThrow(/Corpus file is empty/);
  });

  it('reports embedding progress', async () => {
    const calls: Array<[number, number]> = [];

    await loadCorpus(testConfig(), createHashEmbeddingProvider(), {
      onProgress: (processed, total) => calls.push([processed, total]),
    });

    expect(calls).toEqual([[3, 3]]);
  });
});

describe('createAgentFromConfig', () => {
  it('builds an agent with retrieval over the corpus', async () => {
    const generation = new StubGenerationService(['Final answer: B']);

    const { agent, corpus } = await createAgentFromConfig(testConfig(), {
      generation,
      embedding: createHashEmbeddingProvider(),
    });

    expect(agent.usesRetrieval).toBe(true);
    expect(corpus?.index.chunks).toHaveLength(3);
    expect(await agent.getResponse('Which is the largest planet?', ['Mars', 'Jupiter'])).toBe(1);
    expect(generation.lastPrompt).toContain('[Context 1]\nJupiter is the largest planet in the solar system.');
  });

  it('skips the corpus when retrieval is disabled', async () => {
    const { agent, corpus } = await createAgentFromConfig(testConfig({ corpusPath: join(dir, 'missing.txt') }), {
      rag: false,
      generation: new StubGenerationService(),
    });

    expect(agent.usesRetrieval).toBe(false);
    expect(corpus).toBeUndefined();
  });

  it('honours rag.enabled = false in config', async () => {
    const { agent } = await createAgentFromConfig(testConfig({ ragEnabled: false }), {
      generation: new StubGenerationService(),
    });

    expect(agent.usesRetrieval).toBe(false);
  });

  it('fails before any question when the corpus is missing', async () => {
    const generation = new StubGenerationService();
    const config = testConfig({ corpusPath: join(dir, 'missing.txt') });

    await expect(
      createAgentFromConfig(config, { generation, embedding: createHashEmbeddingProvider() })
    ).rejects.toBeInstanceOf(ConfigError);
    expect(generation.callCount).toBe(0);
  });

  it('rebuilds the cached index when the vector size changes', async () => {
    const config = { ...testConfig(), corpus: { ...testConfig().corpus, cache: true } };
    const cacheDirEnv = process.env.MCQ_HOME;
    process.env.MCQ_HOME = dir;
    try {
      await createAgentFromConfig(config, {
        generation: new StubGenerationService(),
        embedding: createHashEmbeddingProvider({ dimensions: 64 }),
      });

      // Same model name, different vector size
      const result = await createAgentFromConfig(config, {
        generation: new StubGenerationService(),
        embedding: createHashEmbeddingProvider({ dimensions: 32 }),
      });
      expect(result.corpus?.fromCache).toBe(false);
      expect(result.corpus?.index.dimensions).toBe(32);
    } finally {
      if (cacheDirEnv === undefined) delete process.env.MCQ_HOME;
      else process.env.MCQ_HOME = cacheDirEnv;
    }
  });
});

describe('EmbeddingMismatchError', () => {
  it('carries exit code 6', () => {
    expect(new EmbeddingMismatchError({ source: 'query', expected: 64, actual: 32 }).code).toBe(6);
  });
});
