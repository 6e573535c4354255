/**
 * Evaluation Runner Tests
 *
 * Responders are plain objects, so each test controls exactly what the
 * "agent" answers.
 */

import { describe, it, expect, vi } from 'vitest';

import { evaluate, mapWithConcurrency, type EvalProgress } from '../runner.js';
import { EvalError, EvalErrorCodes, type EvalQuestion } from '../types.js';
import type { AgentAnswer, MultipleChoiceResponder } from '../../agent/types.js';
import { ConfigError } from '../../errors/index.js';

const QUESTIONS: EvalQuestion[] = [
  { id: 'q1', question: 'First?', choices: ['a', 'b', 'c'], correctIndex: 0 },
  { id: 'q2', question: 'Second?', choices: ['a', 'b', 'c'], correctIndex: 1 },
  { id: 'q3', question: 'Third?', choices: ['a', 'b', 'c'], correctIndex: 2 },
  { id: 'q4', question: 'Fourth?', choices: ['a', 'b', 'c'], correctIndex: 0 },
];

/** Answers from a question → index table; unknown questions get -1 */
function responder(answers: Record<string, number>): MultipleChoiceResponder {
  return {
    getResponse: async (question) => answers[question] ?? -1,
  };
}

function detailed(outcomeFor: (question: string) => Pick<AgentAnswer, 'index' | 'outcome' | 'error'>): MultipleChoiceResponder {
  return {
    getResponse: async () => -1,
    answer: async (question) => ({
      ...outcomeFor(question),
      extraction: { kind: 'no_match' },
      responseText: '',
      sources: [],
      timings: { retrievalMs: 0, generationMs: 0, totalMs: 0 },
    }),
  };
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('keeps input order whatever the completion order', async () => {
    const delays = [30, 5, 20, 1];

    const results = await mapWithConcurrency(delays, 4, async (ms, i) => {
      await sleep(ms);
      return i * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
  });

  it('never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(2);
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it('returns nothing for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  it('rethrows the first error and stops taking new items', async () => {
    const seen: number[] = [];

    await expect(
      mapWithConcurrency([1, 2, 3, 4, 5], 1, async (n) => {
        seen.push(n);
        if (n === 2) throw new Error('boom');
        return n;
      })
    ).rejects.toThrow('boom');
    expect(seen).toEqual([1, 2]);
  });
});

describe('evaluate', () => {
  it('scores each run and passes when the median reaches the threshold', async () => {
    const agent = responder({ 'First?': 0, 'Second?': 1, 'Third?': 2, 'Fourth?': 1 });

    const summary = await evaluate(QUESTIONS, agent, { runs: 3, threshold: 0.75, concurrency: 2 });

    expect(summary.questionCount).toBe(4);
    expect(summary.runs).toHaveLength(3);
    expect(summary.runs.map((r) => r.accuracy)).toEqual([0.75, 0.75, 0.75]);
    expect(summary.accuracy.median).toBe(0.75);
    expect(summary.passed).toBe(true);
    expect(summary.runs[0]?.results.map((r) => r.id)).toEqual(['q1', 'q2', 'q3', 'q4']);
    expect(summary.config).toEqual({ runs: 3, concurrency: 2, retrieval: false });
  });

  it('fails when the median is below the threshold', async () => {
    const summary = await evaluate(QUESTIONS, responder({ 'First?': 0 }), { runs: 1, threshold: 0.5 });

    expect(summary.accuracy.median).toBe(0.25);
    expect(summary.passed).toBe(false);
  });

  it('decides on the median, not one bad run', async () => {
    let call = 0;
    // Run 2 answers everything wrong; runs 1 and 3 are perfect
    const agent: MultipleChoiceResponder = {
      getResponse: async (question) => {
        const run = Math.floor(call++ / QUESTIONS.length) + 1;
        const q = QUESTIONS.find((x) => x.question === question);
        return run === 2 ? -1 : (q?.correctIndex ?? -1);
      },
    };

    const summary = await evaluate(QUESTIONS, agent, { runs: 3, threshold: 0.9, concurrency: 1 });

    expect(summary.runs.map((r) => r.accuracy)).toEqual([1, 0, 1]);
    expect(summary.accuracy.median).toBe(1);
    expect(summary.passed).toBe(true);
  });

  it('counts no-match answers as wrong', async () => {
    const summary = await evaluate(QUESTIONS, responder({}), { runs: 1 });
    const run = summary.runs[0];

    expect(run?.accuracy).toBe(0);
    expect(run?.noMatchCount).toBe(4);
    expect(run?.results.every((r) => r.predicted === -1 && r.outcome === 'no_match')).toBe(true);
  });

  it('treats an out-of-range prediction as no match', async () => {
    const summary = await evaluate(QUESTIONS.slice(0, 1), responder({ 'First?': 7 }), { runs: 1 });

    expect(summary.runs[0]?.results[0]).toMatchObject({ predicted: -1, outcome: 'no_match', correct: false });
  });

  it('records a throwing agent call as a service error and carries on', async () => {
    const warn = vi.fn();
    const agent: MultipleChoiceResponder = {
      getResponse: async (question) => {
        if (question === 'Second?') throw new Error('connection reset');
        return QUESTIONS.find((q) => q.question === question)?.correctIndex ?? -1;
      },
    };

    const summary = await evaluate(QUESTIONS, agent, { runs: 1, logger: { warn } });
    const run = summary.runs[0];

    expect(run?.correctCount).toBe(3);
    expect(run?.serviceErrorCount).toBe(1);
    expect(run?.results[1]).toMatchObject({ outcome: 'service_error', error: 'connection reset', predicted: -1 });
    expect(warn).toHaveBeenCalledWith('Question q2 failed: connection reset');
  });

  it('uses the detailed answer when the agent offers one', async () => {
    const agent = detailed((question) =>
      question === 'First?'
        ? { index: 0, outcome: 'answered' }
        : { index: -1, outcome: 'service_error', error: 'timed out' }
    );

    const summary = await evaluate(QUESTIONS, agent, { runs: 1 });
    const run = summary.runs[0];

    expect(run?.correctCount).toBe(1);
    expect(run?.serviceErrorCount).toBe(3);
    expect(run?.results[2]?.error).toBe('timed out');
  });

  it('aborts on a setup error', async () => {
    const agent: MultipleChoiceResponder = {
      getResponse: async () => {
        throw new ConfigError('corpus missing');
      },
    };

    await expect(evaluate(QUESTIONS, agent, { runs: 1 })).rejects.toBeInstanceOf(ConfigError);
  });

  it('reports progress per run', async () => {
    const events: EvalProgress[] = [];

    await evaluate(QUESTIONS.slice(0, 2), responder({}), {
      runs: 2,
      concurrency: 1,
      onProgress: (p) => events.push(p),
    });

    expect(events).toEqual([
      { run: 1, runs: 2, completed: 1, total: 2 },
      { run: 1, runs: 2, completed: 2, total: 2 },
      { run: 2, runs: 2, completed: 1, total: 2 },
      { run: 2, runs: 2, completed: 2, total: 2 },
    ]);
  });

  it('records model and retrieval in the config block', async () => {
    const summary = await evaluate(QUESTIONS, responder({}), {
      runs: 1,
      generationModel: 'test-model',
      retrieval: true,
    });

    expect(summary.config).toEqual({ runs: 1, concurrency: 4, generationModel: 'test-model', retrieval: true });
    expect(summary.threshold).toBe(0.7);
  });

  it('rejects an empty question list', async () => {
    await expect(evaluate([], responder({}))).rejects.toMatchObject({ code: EvalErrorCodes.DATASET_INVALID });
  });

  it('rejects out-of-range options', async () => {
    const run = evaluate(QUESTIONS, responder({}), { runs: 0 });

    await expect(run).rejects.toBeInstanceOf(EvalError);
    await expect(run).rejects.toMatchObject({ code: EvalErrorCodes.EVAL_RUN_FAILED });
  });
});
