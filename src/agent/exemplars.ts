/**
 * Few-shot exemplars
 *
 * Worked examples placed before the question so the service sees the
 * expected "Final answer: X" format. A project can replace the built-in
 * set with its own JSON file via `prompt.exemplars_path`.
 */

import * as fs from 'node:fs';
import { z } from 'zod';

import { expandHome } from '../config/paths.js';
import { ConfigError, FileNotFoundError } from '../errors/index.js';
import { safeJsonParse } from '../utils/json.js';
import { ExemplarSchema, type Exemplar } from './types.js';

export const DEFAULT_EXEMPLARS: readonly Exemplar[] = Object.freeze([
  {
    question: 'Which planet in the solar system is closest to the Sun?',
    choices: ['Venus', 'Mercury', 'Earth', 'Mars'],
    reasoning:
      'The inner planets in order of distance from the Sun are Mercury, Venus, Earth and Mars, so Mercury is closest.',
    answer: 'B',
  },
  {
    question: 'What is the boiling point of water at sea level in degrees Celsius?',
    choices: ['50', '90', '100', '120'],
    reasoning:
      'At standard atmospheric pressure pure water boils at 100 degrees Celsius.',
    answer: 'C',
  },
]);

const ExemplarFileSchema = z.array(ExemplarSchema).min(1, 'at least one exemplar is required');

/**
 * Load exemplars from a JSON array file.
 *
 * @throws FileNotFoundError when the file does not exist
 * @throws ConfigError when the file is not valid JSON or an entry is malformed
 */
export function loadExemplars(filePath: string): Exemplar[] {
  const resolved = expandHome(filePath);
  if (!fs.existsSync(resolved)) {
    throw new FileNotFoundError(resolved);
  }

  const raw = safeJsonParse<unknown>(fs.readFileSync(resolved, 'utf-8'), undefined);
  if (raw === undefined) {
    throw new ConfigError(
      `Exemplar file is not valid JSON: ${resolved}`,
      'Fix the file or unset prompt.exemplars_path'
    );
  }

  const parsed = ExemplarFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(
      `Invalid exemplar file ${resolved}: ${issues.join('; ')}`,
      'Each entry needs question, choices (2-26) and an answer label'
    );
  }
  return parsed.data;
}

/**
 * Exemplars for the current prompt settings: none when few-shot is off,
 * the configured file when one is set, otherwise the built-in set.
 */
export function resolveExemplars(prompt: { few_shot: boolean; exemplars_path?: string }): Exemplar[] {
  if (!prompt.few_shot) {
    return [];
  }
  return prompt.exemplars_path ? loadExemplars(prompt.exemplars_path) : [...DEFAULT_EXEMPLARS];
}
