/**
 * Multiple-Choice Agent
 *
 * One question, one pipeline:
 * ```
 * validate → retrieve (optional) → compose → generate (once) → extract
 * ```
 *
 * The agent keeps no state between calls besides its read-only retriever,
 * so the evaluation harness may run many questions through one instance
 * concurrently.
 */

import { ConfigError, APIKeyError } from '../errors/index.js';
import { withTimeout } from '../indexer/index.js';
import type { GenerationService } from '../providers/types.js';
import { EmbeddingMismatchError } from '../search/errors.js';
import type { RetrievalOptions, RetrievalResult } from '../search/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { extractAnswer, type ExtractOptions } from './extractor.js';
import { MAX_CHOICES } from './labels.js';
import { composePrompt } from './prompt.js';
import {
  NO_MATCH,
  type AgentAnswer,
  type Exemplar,
  type MultipleChoiceResponder,
  type ReasoningMode,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Anything that can return context for a query. The Retriever class
 * satisfies it; tests pass plain objects.
 */
export interface ContextSource {
  retrieve(query: string, options?: Partial<RetrievalOptions>): Promise<RetrievalResult>;
}

export interface AgentDeps {
  generation: GenerationService;
  /** Omit to answer without retrieval */
  retriever?: ContextSource;
}

export interface AgentOptions {
  reasoning: ReasoningMode;
  exemplars?: readonly Exemplar[];
  retrieval?: Partial<RetrievalOptions>;
  extraction?: ExtractOptions;
  /** Deadline for the generation call, in milliseconds */
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Thrown into the pending generation call when its deadline passes.
 */
export class GenerationTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(
      `Generation timed out after ${timeoutMs}ms. ` +
        `Consider increasing generation.timeout_ms in ~/.mcq/config.toml`
    );
    this.name = 'GenerationTimeoutError';
  }
}

/**
 * Errors that mean the setup is wrong rather than that one question
 * failed. They propagate out of the agent and abort an evaluation.
 */
export function isFatalAgentError(error: unknown): boolean {
  return (
    error instanceof ConfigError ||
    error instanceof EmbeddingMismatchError ||
    error instanceof APIKeyError
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// AGENT
// ============================================================================

/**
 * @example
 * ```typescript
 * const agent = new MultipleChoiceAgent(
 *   { generation, retriever },
 *   { reasoning: 'chain-of-thought', timeoutMs: 60000 }
 * );
 * const index = await agent.getResponse('Which organelle makes ATP?', [
 *   'Ribosome', 'Mitochondrion', 'Nucleus', 'Golgi apparatus',
 * ]);
 * ```
 */
export class MultipleChoiceAgent implements MultipleChoiceResponder {
  private readonly deps: AgentDeps;
  private readonly options: AgentOptions;
  private readonly logger: Logger;

  constructor(deps: AgentDeps, options: AgentOptions) {
    this.deps = deps;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  /** True when answers are grounded in retrieved context */
  get usesRetrieval(): boolean {
    return this.deps.retriever !== undefined;
  }

  /**
   * Index of the chosen option, or -1 when the input is invalid, the
   * service fails, or no choice can be read from the response.
   */
  async getResponse(question: string, choices: readonly string[]): Promise<number> {
    const result = await this.answer(question, choices);
    return result.index;
  }

  /**
   * Answer with full detail.
   *
   * @throws ConfigError, EmbeddingMismatchError or APIKeyError only; every
   *   per-question failure is reported in the result
   */
  async answer(question: string, choices: readonly string[]): Promise<AgentAnswer> {
    const start = performance.now();
    const timings = { retrievalMs: 0, generationMs: 0, totalMs: 0 };

    const problem = this.validateInput(question, choices);
    if (problem) {
      this.logger.warn(`Invalid question: ${problem}`);
      return {
        index: NO_MATCH,
        outcome: 'invalid_input',
        extraction: { kind: 'no_match' },
        responseText: '',
        sources: [],
        error: problem,
        timings,
      };
    }

    const retrievalStart = performance.now();
    const sources = await this.retrieveContext(question);
    timings.retrievalMs = performance.now() - retrievalStart;

    const prompt = composePrompt({
      question,
      choices,
      context: sources.map((s) => s.chunk.text),
      exemplars: this.options.exemplars,
      reasoning: this.options.reasoning,
    });

    const generationStart = performance.now();
    let responseText: string;
    try {
      responseText = await this.generate(prompt.system, prompt.user);
    } catch (error) {
      if (isFatalAgentError(error)) throw error;
      timings.generationMs = performance.now() - generationStart;
      timings.totalMs = performance.now() - start;
      this.logger.warn(`Generation failed: ${describe(error)}`);
      return {
        index: NO_MATCH,
        outcome: 'service_error',
        extraction: { kind: 'no_match' },
        responseText: '',
        sources,
        error: describe(error),
        timings,
      };
    }
    timings.generationMs = performance.now() - generationStart;

    const extraction = extractAnswer(responseText, choices, this.options.extraction);
    timings.totalMs = performance.now() - start;
    this.logger.debug?.(
      extraction.kind === 'choice'
        ? `Extracted choice ${extraction.index} (${extraction.strategy})`
        : 'No choice found in response'
    );

    return {
      index: extraction.kind === 'choice' ? extraction.index : NO_MATCH,
      outcome: extraction.kind === 'choice' ? 'answered' : 'no_match',
      extraction,
      responseText,
      sources,
      timings,
    };
  }

  private validateInput(question: string, choices: readonly string[]): string | undefined {
    if (typeof question !== 'string' || question.trim() === '') {
      return 'question must be a non-empty string';
    }
    if (choices.length < 2 || choices.length > MAX_CHOICES) {
      return `expected 2-${MAX_CHOICES} choices, got ${choices.length}`;
    }
    if (!choices.every((c) => typeof c === 'string' && c.trim() !== '')) {
      return 'every choice must be a non-empty string';
    }
    return undefined;
  }

  /**
   * Context for the question. Failures other than setup errors are
   * logged and the question is answered without context.
   */
  private async retrieveContext(question: string): Promise<RetrievalResult> {
    const retriever = this.deps.retriever;
    if (!retriever) return [];

    try {
      return await retriever.retrieve(question, this.options.retrieval);
    } catch (error) {
      if (isFatalAgentError(error)) throw error;
      this.logger.warn(`Retrieval failed, answering without context: ${describe(error)}`);
      return [];
    }
  }

  /** Exactly one call to the generation service, bounded by the deadline */
  private async generate(system: string, user: string): Promise<string> {
    const controller = new AbortController();
    const { timeoutMs } = this.options;

    return withTimeout(
      this.deps.generation.generate({
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
        signal: controller.signal,
      }),
      timeoutMs,
      () => new GenerationTimeoutError(timeoutMs),
      () => controller.abort()
    );
  }
}
