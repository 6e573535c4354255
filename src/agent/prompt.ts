/**
 * Prompt Composer
 *
 * Builds the system and user messages for one question. Pure: the same
 * inputs always give the same prompt, and the result never depends on the
 * service it will be sent to.
 *
 * User message layout:
 * ```
 * === Reference material ===        (only when context is present)
 * [Context 1]
 * ...
 * === End of reference material ===
 *
 * Example 1:                         (only when exemplars are present)
 * Question: ...
 * A) ...
 * Reasoning: ...                     (chain-of-thought only)
 * Final answer: B
 *
 * Question: ...
 * A) ...
 * B) ...
 *
 * <mode instruction>
 * Finish your response with the line "Final answer: <LETTER>", ...
 * ```
 */

import { ValidationError } from '../errors/index.js';
import { CHOICE_LABELS, MAX_CHOICES, indexForLabel, labelsFor } from './labels.js';
import type { Exemplar, Prompt, ReasoningMode } from './types.js';

export const SYSTEM_PROMPT =
  'You are an expert test taker answering multiple-choice questions. ' +
  'Use the reference material when it is relevant, otherwise rely on your own knowledge. ' +
  'Always commit to exactly one of the listed options.';

export const CONTEXT_HEADER = '=== Reference material ===';
export const CONTEXT_FOOTER = '=== End of reference material ===';

const MODE_INSTRUCTIONS: Record<ReasoningMode, string> = {
  'chain-of-thought':
    'Think through the question step by step, considering each option before deciding.',
  direct: 'Respond with the final answer line only.',
};

export interface ComposePromptInput {
  question: string;
  choices: readonly string[];
  /** Retrieved passages, most relevant first */
  context?: readonly string[];
  exemplars?: readonly Exemplar[];
  reasoning: ReasoningMode;
}

/**
 * The closing instruction naming the exact answer format the extractor
 * looks for first.
 *
 * @example
 * ```typescript
 * finalAnswerInstruction(['A', 'B', 'C']);
 * // 'Finish your response with the line "Final answer: <LETTER>", where <LETTER> is one of A, B, C.'
 * ```
 */
export function finalAnswerInstruction(labels: readonly string[]): string {
  return `Finish your response with the line "Final answer: <LETTER>", where <LETTER> is one of ${labels.join(', ')}.`;
}

function formatChoices(choices: readonly string[], labels: readonly string[]): string[] {
  return choices.map((choice, i) => `${labels[i] ?? '?'}) ${choice}`);
}

function formatExemplar(exemplar: Exemplar, position: number, reasoning: ReasoningMode): string {
  const labels = labelsFor(exemplar.choices.length);
  const lines = [
    `Example ${position}:`,
    `Question: ${exemplar.question}`,
    ...formatChoices(exemplar.choices, labels),
  ];
  if (reasoning === 'chain-of-thought' && exemplar.reasoning) {
    lines.push(`Reasoning: ${exemplar.reasoning}`);
  }
  lines.push(`Final answer: ${exemplar.answer}`);
  return lines.join('\n');
}

function validateInput(input: ComposePromptInput): void {
  const issues: string[] = [];

  if (input.question.trim() === '') {
    issues.push('question: must not be empty');
  }
  if (input.choices.length === 0) {
    issues.push('choices: at least one choice is required');
  } else if (input.choices.length > MAX_CHOICES) {
    issues.push(`choices: at most ${MAX_CHOICES} choices are supported (got ${input.choices.length})`);
  }

  input.exemplars?.forEach((exemplar, i) => {
    if (indexForLabel(exemplar.answer, exemplar.choices.length) === undefined) {
      issues.push(`exemplars.${i}.answer: "${exemplar.answer}" does not label one of its choices`);
    }
  });

  if (issues.length > 0) {
    throw new ValidationError('Cannot compose prompt', issues);
  }
}

/**
 * Compose the prompt for one question.
 *
 * @throws ValidationError for a blank question, no choices, more choices
 *   than there are labels, or an exemplar whose answer is out of range
 *
 * @example
 * ```typescript
 * const prompt = composePrompt({
 *   question: 'Which gas do plants absorb?',
 *   choices: ['Oxygen', 'Carbon dioxide'],
 *   reasoning: 'direct',
 * });
 * prompt.labels; // ['A', 'B']
 * ```
 */
export function composePrompt(input: ComposePromptInput): Prompt {
  validateInput(input);

  const labels = CHOICE_LABELS.slice(0, input.choices.length);
  const sections: string[] = [];

  const context = (input.context ?? []).filter((passage) => passage.trim() !== '');
  if (context.length > 0) {
    sections.push(
      [
        CONTEXT_HEADER,
        ...context.map((passage, i) => `[Context ${i + 1}]\n${passage.trim()}`),
        CONTEXT_FOOTER,
      ].join('\n\n')
    );
  }

  const exemplars = input.exemplars ?? [];
  if (exemplars.length > 0) {
    sections.push(
      exemplars.map((exemplar, i) => formatExemplar(exemplar, i + 1, input.reasoning)).join('\n\n')
    );
  }

  sections.push(
    [`Question: ${input.question.trim()}`, ...formatChoices(input.choices, labels)].join('\n')
  );
  sections.push([MODE_INSTRUCTIONS[input.reasoning], finalAnswerInstruction(labels)].join('\n'));

  return Object.freeze({
    system: SYSTEM_PROMPT,
    user: sections.join('\n\n'),
    labels: Object.freeze(labels),
  });
}
