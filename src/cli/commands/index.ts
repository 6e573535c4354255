/**
 * Index Command
 *
 * Builds (or verifies) the cached corpus index ahead of time, so the first
 * `mcq ask` or `mcq eval` does not pay for embedding.
 *
 * Usage:
 *   mcq index                    Index the configured corpus.path
 *   mcq index ./notes.txt        Index another file
 *   mcq index --rebuild          Ignore the cache and re-embed
 *   mcq index --json             Output progress as NDJSON
 *
 * The pipeline:
 * 1. Normalising - line endings and blank runs
 * 2. Chunking - overlapping, boundary-aware slices
 * 3. Embedding - vectors for each chunk, in batches
 * 4. Caching - JSON under ~/.mcq/cache keyed by a content fingerprint
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createCorpusProgress, formatDuration } from '../utils/progress.js';
import { loadConfig } from '../../config/loader.js';
import { createEmbeddingFromConfig, loadCorpus, type CorpusSetup } from '../../agent/factory.js';

interface IndexCommandOptions {
  rebuild?: boolean;
}

/**
 * JSON output for `mcq index --json` (final line after progress events).
 */
export interface IndexOutputJSON {
  type: 'complete';
  corpus: string;
  model: string;
  dimensions: number;
  chunks: number;
  failures: Array<{ index: number; error: string }>;
  fromCache: boolean;
  cachePath: string | null;
  durationMs: number;
}

export function toIndexJSON(setup: CorpusSetup, durationMs: number): IndexOutputJSON {
  return {
    type: 'complete',
    corpus: setup.corpusPath,
    model: setup.index.model,
    dimensions: setup.index.dimensions,
    chunks: setup.index.chunks.length,
    failures: setup.index.failures.map((f) => ({ index: f.index, error: f.error })),
    fromCache: setup.fromCache,
    cachePath: setup.cachePath ?? null,
    durationMs: Math.round(durationMs),
  };
}

function showSummary(ctx: CommandContext, setup: CorpusSetup, durationMs: number): void {
  const { index } = setup;
  ctx.log('');
  ctx.log(chalk.green.bold(setup.fromCache ? 'Index Up To Date ✓' : 'Index Complete ✓'));
  ctx.log('');
  ctx.log(`  ${chalk.dim('Corpus:')}        ${setup.corpusPath}`);
  ctx.log(`  ${chalk.dim('Chunks:')}        ${index.chunks.length.toLocaleString()}`);
  ctx.log(`  ${chalk.dim('Model:')}         ${index.model} (${index.dimensions} dimensions)`);
  ctx.log(`  ${chalk.dim('Time elapsed:')}  ${formatDuration(durationMs)}`);
  if (setup.cachePath) {
    ctx.log(`  ${chalk.dim('Cache:')}         ${setup.cachePath}`);
  }

  if (index.failures.length > 0) {
    ctx.log('');
    ctx.log(chalk.yellow(`  ${index.failures.length} chunk(s) could not be embedded`));
    if (ctx.options.verbose) {
      for (const f of index.failures.slice(0, 5)) {
        ctx.log(chalk.dim(`    - chunk ${f.index}: ${f.error}`));
      }
      if (index.failures.length > 5) {
        ctx.log(chalk.dim(`    ... and ${index.failures.length - 5} more`));
      }
    }
  }
  ctx.log('');
}

/**
 * Create the index command.
 */
export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .argument('[corpus]', 'Plain-text corpus file (defaults to corpus.path)')
    .description('Embed the reference corpus and cache its index')
    .option('--rebuild', 'Ignore any cached index and re-embed', false)
    .action(async (corpusArg: string | undefined, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();
      const startTime = performance.now();

      const config = loadConfig();
      ctx.debug(`Embedding: ${config.embedding.model} (${config.embedding.provider})`);
      ctx.debug(`Chunking: size=${config.corpus.chunk_size}, overlap=${config.corpus.chunk_overlap}`);

      const provider = createEmbeddingFromConfig(config);
      const progress = createCorpusProgress(ctx.options);

      let setup: CorpusSetup;
      try {
        setup = await loadCorpus(config, provider, {
          corpusPath: corpusArg,
          refresh: cmdOptions.rebuild ?? false,
          onProgress: progress.onProgress,
          logger: ctx,
        });
      } catch (error) {
        progress.fail('Indexing failed');
        throw error;
      }
      progress.finish();

      const durationMs = performance.now() - startTime;
      if (ctx.options.json) {
        console.log(JSON.stringify(toIndexJSON(setup, durationMs)));
      } else {
        showSummary(ctx, setup, durationMs);
      }
    });
}
