/**
 * Agent Factory
 *
 * Production wiring: config → providers → corpus index → retriever → agent.
 * Everything the agent needs is resolved here, once, so the agent itself
 * never reads global configuration.
 */

import * as fs from 'node:fs';

import { expandHome } from '../config/paths.js';
import type { Config } from '../config/schema.js';
import { ConfigError } from '../errors/index.js';
import { loadOrBuildCorpusIndex, type LoadCorpusIndexResult } from '../indexer/index.js';
import { createEmbeddingProvider, createGenerationService } from '../providers/index.js';
import type { EmbeddingProvider, GenerationService } from '../providers/types.js';
import { Retriever } from '../search/index.js';
import type { Logger } from '../utils/logger.js';
import { MultipleChoiceAgent } from './agent.js';
import { resolveExemplars } from './exemplars.js';

// ============================================================================
// CORPUS
// ============================================================================

export interface LoadCorpusOptions {
  /** Overrides corpus.path */
  corpusPath?: string;
  /** Rebuild even when a cached index exists */
  refresh?: boolean;
  onProgress?: (processed: number, total: number) => void;
  logger?: Logger;
}

export interface CorpusSetup extends LoadCorpusIndexResult {
  /** Resolved corpus file path */
  corpusPath: string;
}

/**
 * Read the configured corpus and return its index, from cache when possible.
 *
 * @throws ConfigError when the corpus file is missing or holds no text
 * @throws IndexBuildError when no chunk could be embedded
 */
export async function loadCorpus(
  config: Config,
  provider: EmbeddingProvider,
  options: LoadCorpusOptions = {}
): Promise<CorpusSetup> {
  const corpusPath = expandHome(options.corpusPath ?? config.corpus.path);

  if (!fs.existsSync(corpusPath)) {
    throw new ConfigError(
      `Corpus file not found: ${corpusPath}`,
      'Set one with: mcq config set corpus.path <file>  (or pass --no-rag)'
    );
  }

  const text = fs.readFileSync(corpusPath, 'utf-8');
  if (text.trim() === '') {
    throw new ConfigError(
      `Corpus file is empty: ${corpusPath}`,
      'Add reference text to the corpus, or pass --no-rag'
    );
  }

  const result = await loadOrBuildCorpusIndex(text, provider, {
    chunkSize: config.corpus.chunk_size,
    chunkOverlap: config.corpus.chunk_overlap,
    batchSize: config.embedding.batch_size,
    timeout: config.embedding.timeout_ms,
    useCache: config.corpus.cache,
    refresh: options.refresh,
    onProgress: options.onProgress,
    logger: options.logger,
  });

  return { ...result, corpusPath };
}

// ============================================================================
// PROVIDERS
// ============================================================================

export function createGenerationFromConfig(config: Config): GenerationService {
  return createGenerationService({
    provider: config.generation.provider,
    model: config.generation.model,
    temperature: config.generation.temperature,
    maxTokens: config.generation.max_tokens,
    timeout: config.generation.timeout_ms,
    maxRetries: config.generation.max_retries,
  });
}

export function createEmbeddingFromConfig(config: Config): EmbeddingProvider {
  return createEmbeddingProvider({
    provider: config.embedding.provider,
    model: config.embedding.model,
    dimensions: config.embedding.dimensions,
    timeout: config.embedding.timeout_ms,
  });
}

// ============================================================================
// AGENT
// ============================================================================

export interface CreateAgentOptions extends LoadCorpusOptions {
  /** Overrides rag.enabled (the CLI's --no-rag) */
  rag?: boolean;
  /** Injected services; built from config when omitted */
  generation?: GenerationService;
  embedding?: EmbeddingProvider;
}

export interface CreatedAgent {
  agent: MultipleChoiceAgent;
  /** Present when retrieval is enabled */
  corpus?: CorpusSetup;
}

/**
 * Build a ready-to-use agent from configuration.
 *
 * With retrieval enabled the corpus index is loaded (or built) before the
 * agent is returned, so no question ever waits on indexing.
 *
 * @throws ConfigError when retrieval is enabled without a usable corpus
 * @throws APIKeyError when a provider key is missing
 * @throws EmbeddingMismatchError when a cached index does not fit the provider
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const { agent } = await createAgentFromConfig(config, { logger: ctx });
 * const index = await agent.getResponse(question, choices);
 * ```
 */
export async function createAgentFromConfig(
  config: Config,
  options: CreateAgentOptions = {}
): Promise<CreatedAgent> {
  const generation = options.generation ?? createGenerationFromConfig(config);
  const exemplars = resolveExemplars(config.prompt);
  const ragEnabled = options.rag ?? config.rag.enabled;

  let corpus: CorpusSetup | undefined;
  let retriever: Retriever | undefined;
  if (ragEnabled) {
    const embedding = options.embedding ?? createEmbeddingFromConfig(config);
    corpus = await loadCorpus(config, embedding, options);
    if (corpus.index.chunks.length === 0) {
      throw new ConfigError(
        `Corpus has no indexable text: ${corpus.corpusPath}`,
        'Add reference text to the corpus, or pass --no-rag'
      );
    }
    retriever = new Retriever(corpus.index, embedding, {
      k: config.rag.top_k,
      maxChars: config.rag.max_chars,
      minScore: config.rag.min_score,
    });
  }

  const agent = new MultipleChoiceAgent(
    { generation, retriever },
    {
      reasoning: config.prompt.reasoning,
      exemplars,
      extraction: {
        numbering: config.extraction.numbering,
        fuzzyThreshold: config.extraction.fuzzy_threshold,
      },
      timeoutMs: config.generation.timeout_ms,
      logger: options.logger,
    }
  );

  return { agent, corpus };
}
