/**
 * Question Sets
 *
 * Loads labelled questions from a JSON file:
 *
 * ```json
 * {
 *   "version": "1.0",
 *   "questions": [
 *     { "id": "q1", "question": "...", "choices": ["...", "..."], "correct": 1 },
 *     { "question": "...", "choices": ["Red", "Blue"], "correct": "Blue" }
 *   ]
 * }
 * ```
 *
 * Pattern: sync fs, Zod validation, EvalError factories.
 */

import * as fs from 'node:fs';

import { expandHome } from '../config/paths.js';
import { safeJsonParse } from '../utils/json.js';
import { EvalError, QuestionSetSchema, type EvalQuestion, type QuestionSet } from './types.js';

/**
 * Turn validated entries into evaluable questions: ids default to their
 * 1-based position, `correct` text is resolved to its index.
 *
 * @throws EvalError DATASET_INVALID for an out-of-range index, text that
 *   matches no choice, or a duplicate id
 */
export function resolveQuestions(set: QuestionSet): EvalQuestion[] {
  const seen = new Set<string>();

  return set.questions.map((entry, i) => {
    const id = entry.id ?? `q${i + 1}`;
    if (seen.has(id)) {
      throw EvalError.datasetInvalid(`duplicate question id "${id}"`);
    }
    seen.add(id);

    let correctIndex: number;
    if (typeof entry.correct === 'number') {
      correctIndex = entry.correct;
      if (correctIndex >= entry.choices.length) {
        throw EvalError.datasetInvalid(
          `question "${id}": correct index ${correctIndex} is out of range (${entry.choices.length} choices)`
        );
      }
    } else {
      correctIndex = entry.choices.indexOf(entry.correct);
      if (correctIndex === -1) {
        throw EvalError.datasetInvalid(
          `question "${id}": correct answer "${entry.correct}" is not one of its choices`
        );
      }
    }

    return { id, question: entry.question, choices: [...entry.choices], correctIndex };
  });
}

/**
 * Parse question-set JSON text.
 *
 * @throws EvalError DATASET_INVALID
 */
export function parseQuestionSet(json: string): EvalQuestion[] {
  const failure: { error?: Error } = {};
  const raw = safeJsonParse<unknown>(json, undefined, (err) => {
    failure.error = err;
  });
  if (failure.error) {
    throw EvalError.datasetInvalid(`not valid JSON (${failure.error.message})`);
  }

  const parsed = QuestionSetSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw EvalError.datasetInvalid(issues.join('; '));
  }

  const questions = resolveQuestions(parsed.data);
  if (questions.length === 0) {
    throw EvalError.datasetInvalid('the file contains no questions');
  }
  return questions;
}

/**
 * Load a question set from disk.
 *
 * @throws EvalError DATASET_NOT_FOUND or DATASET_INVALID
 */
export function loadQuestionSet(filePath: string): EvalQuestion[] {
  const resolved = expandHome(filePath);
  if (!fs.existsSync(resolved)) {
    throw EvalError.datasetNotFound(resolved);
  }
  return parseQuestionSet(fs.readFileSync(resolved, 'utf-8'));
}
