/**
 * Evaluation Reports
 *
 * Terminal rendering and JSON export for EvaluationSummary.
 */

import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { formatTable, type Column, type Row } from '../utils/table.js';
import type { EvaluationSummary, QuestionResult } from './types.js';

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * One row per run: accuracy and the failure breakdown.
 */
export function formatRunsTable(summary: EvaluationSummary): string {
  const columns: Column[] = [
    { header: 'Run', key: 'run', align: 'right' },
    { header: 'Correct', key: 'correct', align: 'right' },
    { header: 'Accuracy', key: 'accuracy', align: 'right' },
    { header: 'No match', key: 'noMatch', align: 'right' },
    { header: 'Service errors', key: 'serviceErrors', align: 'right' },
    { header: 'Time', key: 'time', align: 'right' },
  ];
  const rows: Row[] = summary.runs.map((r) => ({
    run: r.run,
    correct: `${r.correctCount}/${r.total}`,
    accuracy: pct(r.accuracy),
    noMatch: r.noMatchCount,
    serviceErrors: r.serviceErrorCount,
    time: `${(r.durationMs / 1000).toFixed(1)}s`,
  }));
  return formatTable(columns, rows);
}

/**
 * Questions answered wrongly in at least one run, with how often.
 */
export function collectMisses(summary: EvaluationSummary): Array<{ id: string; misses: number }> {
  const misses = new Map<string, number>();
  for (const run of summary.runs) {
    for (const r of run.results) {
      if (!r.correct) misses.set(r.id, (misses.get(r.id) ?? 0) + 1);
    }
  }
  return [...misses.entries()]
    .map(([id, count]) => ({ id, misses: count }))
    .sort((a, b) => b.misses - a.misses || a.id.localeCompare(b.id));
}

function describeResult(r: QuestionResult): string {
  if (r.outcome === 'service_error') return chalk.red(`service error${r.error ? `: ${r.error}` : ''}`);
  if (r.outcome === 'invalid_input') return chalk.yellow(`invalid input${r.error ? `: ${r.error}` : ''}`);
  if (r.outcome === 'no_match') return chalk.yellow('no choice found');
  return `picked ${r.predicted}, expected ${r.correctIndex}`;
}

/**
 * Full terminal report.
 *
 * @param verbose - also list every wrong answer of the last run
 */
export function formatEvaluationReport(summary: EvaluationSummary, verbose = false): string {
  const lines: string[] = [];
  const { accuracy } = summary;

  lines.push(chalk.bold('Evaluation Results'));
  lines.push(
    chalk.dim(
      `Questions: ${summary.questionCount}  |  Runs: ${summary.runs.length}  |  ` +
        `Retrieval: ${summary.config.retrieval ? 'on' : 'off'}` +
        (summary.config.generationModel ? `  |  Model: ${summary.config.generationModel}` : '')
    )
  );
  lines.push('');
  lines.push(formatRunsTable(summary));
  lines.push('');
  lines.push(
    `  Median ${chalk.bold(pct(accuracy.median))}  ` +
      chalk.dim(`(mean ${pct(accuracy.mean)}, min ${pct(accuracy.min)}, max ${pct(accuracy.max)})`)
  );
  lines.push(
    `  Threshold ${pct(summary.threshold)}  ` +
      (summary.passed ? chalk.green('PASS') : chalk.red('FAIL'))
  );

  const misses = collectMisses(summary);
  if (misses.length > 0) {
    lines.push('');
    lines.push(chalk.dim(`  Missed at least once (${misses.length}):`));
    for (const m of misses.slice(0, 10)) {
      lines.push(chalk.dim(`    ${m.id}  ${m.misses}/${summary.runs.length} runs`));
    }
    if (misses.length > 10) {
      lines.push(chalk.dim(`    ... and ${misses.length - 10} more`));
    }
  }

  const lastRun = summary.runs[summary.runs.length - 1];
  if (verbose && lastRun) {
    lines.push('');
    lines.push(chalk.dim(`  Run ${lastRun.run} details:`));
    for (const r of lastRun.results.filter((res) => !res.correct)) {
      lines.push(`    ${r.id}  ${describeResult(r)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Write the summary as pretty-printed JSON, creating parent directories.
 */
export function writeEvaluationReport(filePath: string, summary: EvaluationSummary): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2) + '\n', 'utf-8');
}
