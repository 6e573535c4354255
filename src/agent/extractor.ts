/**
 * Answer Extractor
 *
 * Maps free-form response text to a choice index. Strategies run in a
 * fixed order and the first one that finds a choice wins:
 *
 * 1. label   - an explicit cue ("Final answer: C", "the answer is B",
 *              "option D"), then a standalone label ("C)", "(B)", "**A**")
 * 2. numeric - a bare integer, read with the configured numbering
 * 3. fuzzy   - the response echoes a choice's text
 *
 * Within a strategy the LAST matching occurrence wins, since responses
 * tend to reason first and conclude at the end. Never throws.
 */

import { indexForLabel } from './labels.js';
import { NO_MATCH, type ExtractionResult, type Numbering } from './types.js';

// ============================================================================
// OPTIONS
// ============================================================================

export interface ExtractOptions {
  /** How bare integers map to choices (default 'zero-based') */
  numbering?: Numbering;
  /** Minimum similarity for a fuzzy match (default 0.8) */
  fuzzyThreshold?: number;
}

interface ResolvedOptions {
  numbering: Numbering;
  fuzzyThreshold: number;
}

export const DEFAULT_FUZZY_THRESHOLD = 0.8;

/** Longer responses are cut to their tail, where the conclusion sits */
export const MAX_RESPONSE_CHARS = 50_000;

type Strategy = (
  response: string,
  choices: readonly string[],
  options: ResolvedOptions
) => ExtractionResult | null;

// ============================================================================
// LABEL STRATEGY
// ============================================================================

/**
 * Cue phrases in priority order. Each group is searched on its own and its
 * last hit is taken before the next group is tried. Only "final answer" is
 * unambiguous enough to take a lowercase label.
 */
const LABEL_CUE_GROUPS: ReadonlyArray<{ cue: string; anyCase: boolean }> = [
  { cue: 'final\\s+answer', anyCase: true },
  { cue: 'correct\\s+(?:answer|option|choice)|answer|conclusion', anyCase: false },
  { cue: 'option|choice', anyCase: false },
];

function cuePattern(cue: string): RegExp {
  // cue, punctuation or a linking verb, then the label as a whole word
  return new RegExp(
    `\\b(?:${cue})\\b[^A-Za-z0-9\\n]{0,10}(?:(?:is|was|would\\s+be|should\\s+be)\\b[^A-Za-z0-9\\n]{0,5})?([A-Za-z])\\b`,
    'gi'
  );
}

interface LabelPattern {
  pattern: RegExp;
  anyCase: boolean;
}

const LABEL_PATTERNS: readonly LabelPattern[] = [
  ...LABEL_CUE_GROUPS.map(({ cue, anyCase }) => ({ pattern: cuePattern(cue), anyCase })),
  /** "C)", "(C)", "C.", "C:", "**C**", or "C" alone at the end of a line */
  { pattern: /(?<![A-Za-z0-9])\(?([A-Z])(?:\)|\]|\.(?!\w)|:|\*\*|[ \t]*$)/gm, anyCase: false },
];

/** A letter followed by a lowercase word reads as prose ("a tricky one") */
const FOLLOWED_BY_WORD = /^[ \t]+[a-z]/;

/** "I think", "I'd say": the pronoun, not choice I */
const PRONOUN_I =
  /^(?:'[a-z]|[ \t]+(?:am|think|believe|guess|would|will|feel|suspect|can|cannot|could|do|don't|need|should|must|might|choose|chose|pick|picked|say|agree|see|know|was|have|had|lean|go)\b)/;

function isLabel(letter: string, tail: string, anyCase: boolean): boolean {
  if (letter === 'I' && PRONOUN_I.test(tail)) return false;
  if (letter === letter.toUpperCase()) return true;
  // Otherwise the article "a" would read as choice A
  return anyCase && !FOLLOWED_BY_WORD.test(tail);
}

function lastLabel({ pattern, anyCase }: LabelPattern, response: string, choiceCount: number): number | undefined {
  let found: number | undefined;
  for (const match of response.matchAll(pattern)) {
    const letter = match[1];
    if (letter === undefined) continue;
    const after = (match.index ?? 0) + match[0].length;
    const tail = response.slice(after, after + 16);
    if (!isLabel(letter, tail, anyCase)) continue;
    const index = indexForLabel(letter.toUpperCase(), choiceCount);
    if (index !== undefined) found = index;
  }
  return found;
}

const matchLabel: Strategy = (response, choices) => {
  for (const labelPattern of LABEL_PATTERNS) {
    const index = lastLabel(labelPattern, response, choices.length);
    if (index !== undefined) {
      return { kind: 'choice', index, strategy: 'label' };
    }
  }
  return null;
};

// ============================================================================
// NUMERIC STRATEGY
// ============================================================================

/** Integers not part of a word or a decimal */
const BARE_INTEGER = /(?<![\w.])(\d+)(?![\w]|\.\d)/g;

const matchNumeric: Strategy = (response, choices, options) => {
  const offset = options.numbering === 'one-based' ? 1 : 0;
  let found: number | undefined;
  for (const match of response.matchAll(BARE_INTEGER)) {
    const index = Number.parseInt(match[1] ?? '', 10) - offset;
    if (Number.isInteger(index) && index >= 0 && index < choices.length) {
      found = index;
    }
  }
  return found === undefined ? null : { kind: 'choice', index: found, strategy: 'numeric' };
};

// ============================================================================
// FUZZY STRATEGY
// ============================================================================

/**
 * Lowercase, replace everything but letters and digits with a space,
 * collapse runs of spaces.
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

function bigrams(text: string): Map<string, number> {
  const grams = new Map<string, number>();
  for (let i = 0; i < text.length - 1; i++) {
    const gram = text.slice(i, i + 2);
    grams.set(gram, (grams.get(gram) ?? 0) + 1);
  }
  return grams;
}

/**
 * Sørensen-Dice coefficient over character bigrams, in [0, 1].
 */
export function diceSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;

  const left = bigrams(a);
  const right = bigrams(b);
  let overlap = 0;
  for (const [gram, count] of left) {
    overlap += Math.min(count, right.get(gram) ?? 0);
  }
  return (2 * overlap) / (a.length - 1 + (b.length - 1));
}

/**
 * Index of the single best candidate, or undefined when the best score is
 * shared by more than one choice.
 */
function uniqueBest(scores: readonly number[]): number | undefined {
  let best = -Infinity;
  let bestIndex: number | undefined;
  let tied = false;
  scores.forEach((score, i) => {
    if (score > best) {
      best = score;
      bestIndex = i;
      tied = false;
    } else if (score === best) {
      tied = true;
    }
  });
  return tied ? undefined : bestIndex;
}

const matchFuzzy: Strategy = (response, choices, options) => {
  const text = normalizeText(response);
  if (text === '') return null;
  const normalizedChoices = choices.map(normalizeText);

  // Whole-word containment: longest contained choice wins
  const padded = ` ${text} `;
  const contained = normalizedChoices.map((c) => (c !== '' && padded.includes(` ${c} `) ? c.length : 0));
  if (contained.some((len) => len > 0)) {
    const index = uniqueBest(contained);
    return index === undefined ? null : { kind: 'choice', index, strategy: 'fuzzy', score: 1 };
  }

  const lines = response
    .split('\n')
    .map(normalizeText)
    .filter((line) => line !== '');
  const scores = normalizedChoices.map((c) =>
    c === '' ? 0 : Math.max(diceSimilarity(text, c), ...lines.map((line) => diceSimilarity(line, c)))
  );

  const index = uniqueBest(scores);
  if (index === undefined) return null;
  const score = scores[index] ?? 0;
  return score >= options.fuzzyThreshold
    ? { kind: 'choice', index, strategy: 'fuzzy', score }
    : null;
};

// ============================================================================
// PUBLIC API
// ============================================================================

const STRATEGIES: readonly Strategy[] = [matchLabel, matchNumeric, matchFuzzy];

/**
 * Extract the chosen option from a response.
 *
 * A non-string or blank response, or an empty choice list, gives no_match.
 *
 * @example
 * ```typescript
 * extractAnswer('A is wrong because... Final answer: C', ['x', 'y', 'C-text', 'z']);
 * // { kind: 'choice', index: 2, strategy: 'label' }
 * ```
 */
export function extractAnswer(
  response: unknown,
  choices: readonly string[],
  options: ExtractOptions = {}
): ExtractionResult {
  if (typeof response !== 'string' || response.trim() === '' || choices.length === 0) {
    return { kind: 'no_match' };
  }

  const text = response.length > MAX_RESPONSE_CHARS ? response.slice(-MAX_RESPONSE_CHARS) : response;
  const safeChoices = choices.map((c) => (typeof c === 'string' ? c : ''));
  const resolved: ResolvedOptions = {
    numbering: options.numbering ?? 'zero-based',
    fuzzyThreshold: options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD,
  };

  for (const strategy of STRATEGIES) {
    const result = strategy(text, safeChoices, resolved);
    if (result) return result;
  }
  return { kind: 'no_match' };
}

/**
 * Same as extractAnswer, reduced to the index (NO_MATCH when none).
 */
export function extractAnswerIndex(
  response: unknown,
  choices: readonly string[],
  options: ExtractOptions = {}
): number {
  const result = extractAnswer(response, choices, options);
  return result.kind === 'choice' ? result.index : NO_MATCH;
}
