/**
 * Evaluation Report Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import {
  collectMisses,
  formatEvaluationReport,
  formatRunsTable,
  writeEvaluationReport,
} from '../report.js';
import type { EvaluationSummary, QuestionResult, RunResult } from '../types.js';

function result(id: string, correct: boolean, extra: Partial<QuestionResult> = {}): QuestionResult {
  return {
    id,
    predicted: correct ? 0 : 1,
    correctIndex: 0,
    correct,
    outcome: 'answered',
    latencyMs: 5,
    ...extra,
  };
}

function run(n: number, results: QuestionResult[], durationMs = 1500): RunResult {
  const correctCount = results.filter((r) => r.correct).length;
  return {
    run: n,
    accuracy: correctCount / results.length,
    correctCount,
    total: results.length,
    noMatchCount: results.filter((r) => r.outcome === 'no_match').length,
    serviceErrorCount: results.filter((r) => r.outcome === 'service_error').length,
    invalidCount: 0,
    durationMs,
    results,
  };
}

function summary(runs: RunResult[], passed: boolean): EvaluationSummary {
  return {
    timestamp: '2026-01-01T00:00:00.000Z',
    questionCount: runs[0]?.total ?? 0,
    runs,
    accuracy: { median: 0.75, mean: 0.5, min: 0.25, max: 0.75 },
    threshold: 0.7,
    passed,
    config: { runs: runs.length, concurrency: 4, generationModel: 'test-model', retrieval: true },
  };
}

const SAMPLE = summary(
  [
    run(1, [result('a', true), result('b', false), result('c', true), result('d', true)]),
    run(2, [
      result('a', true),
      result('b', false, { predicted: -1, outcome: 'no_match' }),
      result('c', false, { predicted: -1, outcome: 'service_error', error: 'timed out' }),
      result('d', false),
    ], 250),
  ],
  true
);

let previousLevel: typeof chalk.level;

beforeAll(() => {
  previousLevel = chalk.level;
  chalk.level = 0;
});

afterAll(() => {
  chalk.level = previousLevel;
});

describe('formatRunsTable', () => {
  it('renders one row per run', () => {
    const lines = formatRunsTable(SAMPLE).split('\n');

    expect(lines).toHaveLength(6);
    expect(lines[1]).toBe('│ Run │ Correct │ Accuracy │ No match │ Service errors │ Time │');
    expect(lines[3]).toBe('│   1 │     3/4 │    75.0% │        0 │              0 │ 1.5s │');
    expect(lines[4]).toBe('│   2 │     1/4 │    25.0% │        1 │              1 │ 0.3s │');
  });
});

describe('collectMisses', () => {
  it('counts misses per question, most missed first', () => {
    expect(collectMisses(SAMPLE)).toEqual([
      { id: 'b', misses: 2 },
      { id: 'c', misses: 1 },
      { id: 'd', misses: 1 },
    ]);
  });

  it('is empty when every answer was right', () => {
    const perfect = summary([run(1, [result('a', true)])], true);
    expect(collectMisses(perfect)).toEqual([]);
  });
});

describe('formatEvaluationReport', () => {
  it('shows the header, the median and the verdict', () => {
    const lines = formatEvaluationReport(SAMPLE).split('\n');

    expect(lines[0]).toBe('Evaluation Results');
    expect(lines[1]).toBe('Questions: 4  |  Runs: 2  |  Retrieval: on  |  Model: test-model');
    expect(lines).toContain('  Median 75.0%  (mean 50.0%, min 25.0%, max 75.0%)');
    expect(lines).toContain('  Threshold 70.0%  PASS');
    expect(lines).toContain('  Missed at least once (3):');
    expect(lines).toContain('    b  2/2 runs');
    expect(lines).not.toContain('  Run 2 details:');
  });

  it('prints FAIL for a failed evaluation', () => {
    const failed = { ...SAMPLE, passed: false };
    expect(formatEvaluationReport(failed).split('\n')).toContain('  Threshold 70.0%  FAIL');
  });

  it('lists the last run\'s wrong answers when verbose', () => {
    const lines = formatEvaluationReport(SAMPLE, true).split('\n');
    const details = lines.slice(lines.indexOf('  Run 2 details:') + 1);

    expect(details).toEqual([
      '    b  no choice found',
      '    c  service error: timed out',
      '    d  picked 1, expected 0',
    ]);
  });
});

describe('writeEvaluationReport', () => {
  it('writes pretty JSON with a trailing newline, creating directories', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mcq-report-'));
    const file = path.join(dir, 'nested', 'report.json');

    try {
      writeEvaluationReport(file, SAMPLE);
      const text = fs.readFileSync(file, 'utf-8');

      expect(text.endsWith('}\n')).toBe(true);
      expect(JSON.parse(text)).toEqual(SAMPLE);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
