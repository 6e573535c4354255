/**
 * In-process stand-ins for the generation and embedding services.
 *
 * Tests never reach the network: the generation stub replays scripted
 * responses and the embedding stub hashes words into a fixed-size vector,
 * so texts that share words land close together.
 */

import type {
  EmbeddingProvider,
  EmbeddingResult,
  GenerationRequest,
  GenerationService,
} from '../providers/types.js';

// ============================================================================
// GENERATION
// ============================================================================

/**
 * A scripted reply: fixed text, an error to reject with, or a function of
 * the request.
 */
export type ScriptedReply = string | Error | ((request: GenerationRequest) => string | Promise<string>);

/**
 * Generation service that replays replies in order and records every
 * request. The last reply repeats once the script runs out.
 *
 * @example
 * ```typescript
 * const service = new StubGenerationService(['Final answer: B']);
 * const agent = new MultipleChoiceAgent({ generation: service }, options);
 * await agent.getResponse('Q?', ['a', 'b']); // 1
 * expect(service.requests).toHaveLength(1);
 * ```
 */
export class StubGenerationService implements GenerationService {
  readonly name = 'stub';
  readonly model: string;
  readonly requests: GenerationRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = ['Final answer: A'], model = 'stub-model') {
    this.replies = replies;
    this.model = model;
  }

  get callCount(): number {
    return this.requests.length;
  }

  /** User message of the most recent request */
  get lastPrompt(): string {
    const last = this.requests[this.requests.length - 1];
    return last?.messages.find((m) => m.role === 'user')?.content ?? '';
  }

  async generate(request: GenerationRequest): Promise<string> {
    const reply = this.replies[Math.min(this.requests.length, this.replies.length - 1)];
    this.requests.push(request);

    if (reply === undefined) return '';
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(request);
    return reply;
  }
}

/**
 * Generation service that never settles unless its request is aborted,
 * in which case it rejects with the abort reason.
 */
export function createHangingGenerationService(): GenerationService & { aborted: boolean } {
  const service: GenerationService & { aborted: boolean } = {
    name: 'hanging',
    model: 'stub-model',
    aborted: false,
    generate(request: GenerationRequest): Promise<string> {
      return new Promise<string>((_resolve, reject) => {
        request.signal?.addEventListener('abort', () => {
          service.aborted = true;
          reject(new Error('request aborted'));
        });
      });
    },
  };
  return service;
}

// ============================================================================
// EMBEDDING
// ============================================================================

export interface HashEmbeddingOptions {
  /** @default 64 */
  dimensions?: number;
  /** @default 'hash-embed' */
  model?: string;
  /** Reject every call with this error */
  failWith?: Error;
}

function hashWord(word: string): number {
  // FNV-1a
  let hash = 0x811c9dc5;
  for (let i = 0; i < word.length; i++) {
    hash ^= word.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Bag-of-words vector: each lowercase word adds 1 to a hashed slot, then
 * the vector is scaled to unit length. Text with no words maps to the
 * zero vector.
 */
export function hashEmbed(text: string, dimensions = 64): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    const slot = hashWord(word) % dimensions;
    vector[slot] = (vector[slot] ?? 0) + 1;
  }
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

export type StubEmbeddingProvider = EmbeddingProvider & {
  /** Texts passed to each embedBatch call, in order */
  readonly batches: string[][];
};

/**
 * Deterministic embedding provider for tests.
 */
export function createHashEmbeddingProvider(options: HashEmbeddingOptions = {}): StubEmbeddingProvider {
  const dimensions = options.dimensions ?? 64;
  const model = options.model ?? 'hash-embed';
  const batches: string[][] = [];

  async function embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    batches.push([...texts]);
    if (options.failWith) throw options.failWith;
    return texts.map((text) => ({ embedding: hashEmbed(text, dimensions), model }));
  }

  return {
    name: 'stub',
    model,
    dimensions,
    batches,
    embedBatch,
    async embed(text: string): Promise<EmbeddingResult> {
      const [result] = await embedBatch([text]);
      if (result === undefined) throw new Error('no vector');
      return result;
    },
  };
}
