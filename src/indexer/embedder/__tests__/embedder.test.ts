/**
 * Embedder Tests
 *
 * Uses in-process providers; nothing leaves the test.
 */

import { describe, it, expect, vi } from 'vitest';

import { embedChunks, withTimeout, EmbeddingTimeoutError } from '../embedder.js';
import type { EmbeddingProvider, EmbeddingResult } from '../../../providers/types.js';
import type { TextChunk } from '../../types.js';
import { createHashEmbeddingProvider } from '../../../test-utils/index.js';

function makeChunks(texts: string[]): TextChunk[] {
  let offset = 0;
  return texts.map((text, index) => {
    const chunk = { index, start: offset, end: offset + text.length, text };
    offset += text.length + 1;
    return chunk;
  });
}

/**
 * Provider that rejects any batch containing a text with "BAD" and
 * returns an empty vector for texts with "EMPTY".
 */
function createPickyProvider(): EmbeddingProvider {
  const embedBatch = async (texts: string[]): Promise<EmbeddingResult[]> => {
    if (texts.some((t) => t.includes('BAD'))) {
      throw new Error('provider rejected input');
    }
    return texts.map((t) => ({ embedding: t.includes('EMPTY') ? [] : [1, 0], model: 'picky' }));
  };
  return {
    name: 'picky',
    model: 'picky',
    embedBatch,
    embed: async (text) => {
      const [result] = await embedBatch([text]);
      if (!result) throw new Error('no vector');
      return result;
    },
  };
}

describe('embedChunks', () => {
  it('embeds every chunk in batches', async () => {
    const provider = createHashEmbeddingProvider();
    const chunks = makeChunks(['one', 'two', 'three', 'four', 'five']);
    const onProgress = vi.fn();

    const { embedded, failures } = await embedChunks(chunks, provider, { batchSize: 2, onProgress });

    expect(provider.batches).toEqual([['one', 'two'], ['three', 'four'], ['five']]);
    expect(embedded.map((c) => c.index)).toEqual([0, 1, 2, 3, 4]);
    expect(embedded[0]?.embedding).toHaveLength(64);
    expect(failures).toEqual([]);
    expect(onProgress.mock.calls).toEqual([
      [2, 5],
      [4, 5],
      [5, 5],
    ]);
  });

  it('retries a failed batch chunk by chunk and records only the bad chunk', async () => {
    const chunks = makeChunks(['good one', 'BAD chunk', 'good two']);
    const onError = vi.fn();

    const { embedded, failures } = await embedChunks(chunks, createPickyProvider(), {
      batchSize: 3,
      onError,
    });

    expect(embedded.map((c) => c.text)).toEqual(['good one', 'good two']);
    expect(failures).toEqual([{ index: 1, start: 9, end: 18, error: 'provider rejected input' }]);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[1]).toBe(1);
  });

  it('treats an empty vector as a failure', async () => {
    const { embedded, failures } = await embedChunks(makeChunks(['fine', 'EMPTY']), createPickyProvider());

    expect(embedded).toHaveLength(1);
    expect(failures[0]?.error).toBe('Empty embedding returned for chunk');
  });

  it('gives up on a chunk whose call exceeds the timeout', async () => {
    const hanging: EmbeddingProvider = {
      name: 'hanging',
      model: 'hanging',
      embed: () => new Promise(() => {}),
      embedBatch: () => new Promise(() => {}),
    };

    const { embedded, failures } = await embedChunks(makeChunks(['slow']), hanging, { timeout: 10 });

    expect(embedded).toEqual([]);
    expect(failures[0]?.error).toContain('timed out after 10ms');
  });
});

describe('withTimeout', () => {
  it('resolves with the value when in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, () => new Error('late'))).resolves.toBe(42);
  });

  it('passes the promise through when no timeout is set', async () => {
    await expect(withTimeout(Promise.resolve('ok'), undefined, () => new Error('late'))).resolves.toBe('ok');
  });

  it('rejects with the supplied error on timeout', async () => {
    const never = new Promise<number>(() => {});
    await expect(withTimeout(never, 5, () => new EmbeddingTimeoutError(5))).rejects.toBeInstanceOf(
      EmbeddingTimeoutError
    );
  });

  it('raises the deadline error before the timeout hook runs', async () => {
    let cancel: (reason: Error) => void = () => {};
    const cancellable = new Promise<number>((_resolve, reject) => {
      cancel = reject;
    });

    await expect(
      withTimeout(cancellable, 5, () => new EmbeddingTimeoutError(5), () => cancel(new Error('cancelled')))
    ).rejects.toBeInstanceOf(EmbeddingTimeoutError);
  });
});
