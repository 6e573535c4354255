/**
 * Corpus Index Cache
 *
 * Stores a built index as JSON under ~/.mcq/cache so later runs skip the
 * embedding calls. Files are keyed by a SHA-256 fingerprint of everything
 * that shapes the index: corpus text, embedding model and dimensions, and
 * chunking parameters. A file that fails to parse or validate, or whose
 * fingerprint differs, is ignored and the index is rebuilt.
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

import { getCacheDir } from '../config/paths.js';
import type { EmbeddingProvider } from '../providers/types.js';
import { safeJsonParse } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { buildCorpusIndex, freezeCorpusIndex, type BuildCorpusIndexOptions } from './corpus-index.js';
import type { ChunkingOptions, CorpusIndex } from './types.js';

const CACHE_VERSION = 1;

const CachedIndexSchema = z.object({
  version: z.literal(CACHE_VERSION),
  fingerprint: z.string(),
  model: z.string(),
  dimensions: z.number().int().min(0),
  chunks: z.array(
    z.object({
      index: z.number().int().min(0),
      start: z.number().int().min(0),
      end: z.number().int().min(0),
      text: z.string(),
      embedding: z.array(z.number()),
    })
  ),
  failures: z.array(
    z.object({
      index: z.number().int().min(0),
      start: z.number().int().min(0),
      end: z.number().int().min(0),
      error: z.string(),
    })
  ),
});

export interface FingerprintInput extends ChunkingOptions {
  model: string;
  dimensions?: number;
}

/**
 * Fingerprint of a corpus plus the settings that shape its index.
 */
export function indexFingerprint(corpusText: string, input: FingerprintInput): string {
  return createHash('sha256')
    .update(
      JSON.stringify({
        model: input.model,
        dimensions: input.dimensions ?? null,
        chunkSize: input.chunkSize,
        chunkOverlap: input.chunkOverlap,
      })
    )
    .update('\0')
    .update(corpusText)
    .digest('hex');
}

export function getIndexCachePath(fingerprint: string, cacheDir: string = getCacheDir()): string {
  return path.join(cacheDir, `index-${fingerprint.slice(0, 16)}.json`);
}

/**
 * Read a cached index. Returns null when there is no usable entry.
 */
export function readIndexCache(
  cachePath: string,
  fingerprint: string,
  logger: Logger = silentLogger
): CorpusIndex | null {
  if (!fs.existsSync(cachePath)) {
    return null;
  }

  const raw = safeJsonParse<unknown>(fs.readFileSync(cachePath, 'utf-8'), null, (err) => {
    logger.warn(`Ignoring corrupt index cache ${cachePath}: ${err.message}`);
  });
  if (raw === null) {
    return null;
  }

  const parsed = CachedIndexSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Ignoring index cache with unexpected shape: ${cachePath}`);
    return null;
  }
  if (parsed.data.fingerprint !== fingerprint) {
    logger.warn(`Ignoring stale index cache: ${cachePath}`);
    return null;
  }

  const { model, dimensions, chunks, failures } = parsed.data;
  return freezeCorpusIndex({ model, dimensions, chunks, failures });
}

export function writeIndexCache(cachePath: string, fingerprint: string, index: CorpusIndex): void {
  fs.mkdirSync(path.dirname(cachePath), { recursive: true });
  const payload: z.infer<typeof CachedIndexSchema> = {
    version: CACHE_VERSION,
    fingerprint,
    model: index.model,
    dimensions: index.dimensions,
    chunks: index.chunks.map((c) => ({ ...c, embedding: [...c.embedding] })),
    failures: index.failures.map((f) => ({ ...f })),
  };
  fs.writeFileSync(cachePath, JSON.stringify(payload), 'utf-8');
}

export interface LoadCorpusIndexOptions extends BuildCorpusIndexOptions {
  /** Read and write the cache (default true) */
  useCache?: boolean;
  /** Ignore any cached entry, rebuild, and overwrite it */
  refresh?: boolean;
  /** Overrides ~/.mcq/cache */
  cacheDir?: string;
}

export interface LoadCorpusIndexResult {
  index: CorpusIndex;
  fromCache: boolean;
  cachePath?: string;
}

/**
 * Return the cached index for this corpus, or build and cache it.
 */
export async function loadOrBuildCorpusIndex(
  corpusText: string,
  provider: EmbeddingProvider,
  options: LoadCorpusIndexOptions
): Promise<LoadCorpusIndexResult> {
  const { useCache = true, refresh = false, cacheDir, ...buildOptions } = options;
  const logger = options.logger ?? silentLogger;

  if (!useCache) {
    return { index: await buildCorpusIndex(corpusText, provider, buildOptions), fromCache: false };
  }

  const fingerprint = indexFingerprint(corpusText, {
    model: provider.model,
    dimensions: provider.dimensions,
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
  });
  const cachePath = getIndexCachePath(fingerprint, cacheDir);

  const cached = refresh ? null : readIndexCache(cachePath, fingerprint, logger);
  if (cached) {
    logger.debug?.(`Loaded ${cached.chunks.length} chunks from ${cachePath}`);
    return { index: cached, fromCache: true, cachePath };
  }

  const index = await buildCorpusIndex(corpusText, provider, buildOptions);
  try {
    writeIndexCache(cachePath, fingerprint, index);
  } catch (error) {
    // The index is usable without its cache file
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not write index cache ${cachePath}: ${message}`);
    return { index, fromCache: false };
  }
  return { index, fromCache: false, cachePath };
}
