/**
 * Default Configuration Values
 *
 * Used when no config.toml exists yet, or when it leaves fields out.
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  generation: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    temperature: 0,
    max_tokens: 1024,
    timeout_ms: 60000,
    max_retries: 2,
  },

  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small', // 1536 dimensions
    batch_size: 32,
    timeout_ms: 120000,
  },

  // ~800 tokens per chunk at roughly 4 characters per token
  corpus: {
    path: '~/.mcq/corpus.txt',
    chunk_size: 3200,
    chunk_overlap: 200,
    cache: true,
  },

  rag: {
    enabled: true,
    top_k: 3,
    max_chars: 6000,
    min_score: 0.3,
  },

  prompt: {
    reasoning: 'chain-of-thought',
    few_shot: true,
  },

  extraction: {
    numbering: 'zero-based',
    fuzzy_threshold: 0.8,
  },

  eval: {
    runs: 3,
    threshold: 0.7,
    concurrency: 4,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.mcq/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# mcq configuration
# Location: ~/.mcq/config.toml

# Text generation (one call per question)
# provider: "openai" | "ollama" | "openai-compatible"
[generation]
provider = "${DEFAULT_CONFIG.generation.provider}"
model = "${DEFAULT_CONFIG.generation.model}"
temperature = ${DEFAULT_CONFIG.generation.temperature}
max_tokens = ${DEFAULT_CONFIG.generation.max_tokens}
timeout_ms = ${DEFAULT_CONFIG.generation.timeout_ms}
max_retries = ${DEFAULT_CONFIG.generation.max_retries}

# Embeddings for the reference corpus and for questions
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
# dimensions = 512   # only for models that accept a size

# Reference corpus (plain text)
[corpus]
path = "${DEFAULT_CONFIG.corpus.path}"
chunk_size = ${DEFAULT_CONFIG.corpus.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.corpus.chunk_overlap}
cache = ${DEFAULT_CONFIG.corpus.cache}

# Retrieval
[rag]
enabled = ${DEFAULT_CONFIG.rag.enabled}
top_k = ${DEFAULT_CONFIG.rag.top_k}
max_chars = ${DEFAULT_CONFIG.rag.max_chars}
min_score = ${DEFAULT_CONFIG.rag.min_score}

# Prompt composition
# reasoning: "chain-of-thought" | "direct"
[prompt]
reasoning = "${DEFAULT_CONFIG.prompt.reasoning}"
few_shot = ${DEFAULT_CONFIG.prompt.few_shot}
# exemplars_path = "~/.mcq/exemplars.json"

# Answer extraction
# numbering: how bare numbers in responses map to choices ("zero-based" | "one-based")
[extraction]
numbering = "${DEFAULT_CONFIG.extraction.numbering}"
fuzzy_threshold = ${DEFAULT_CONFIG.extraction.fuzzy_threshold}

# Evaluation harness
[eval]
runs = ${DEFAULT_CONFIG.eval.runs}
threshold = ${DEFAULT_CONFIG.eval.threshold}
concurrency = ${DEFAULT_CONFIG.eval.concurrency}
`;
