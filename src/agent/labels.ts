/**
 * Choice labels
 *
 * The one table mapping choice positions to the letters shown in prompts.
 * The prompt composer and the answer extractor both read it from here.
 */

/** CHOICE_LABELS[i] labels choice i */
export const CHOICE_LABELS: readonly string[] = Object.freeze([...'ABCDEFGHIJKLMNOPQRSTUVWXYZ']);

/** Most choices a question can have */
export const MAX_CHOICES = CHOICE_LABELS.length;

/**
 * Label for a choice position.
 *
 * @throws RangeError outside [0, MAX_CHOICES)
 */
export function labelForIndex(index: number): string {
  const label = Number.isInteger(index) ? CHOICE_LABELS[index] : undefined;
  if (label === undefined) {
    throw new RangeError(`No label for choice index ${index} (supported: 0-${MAX_CHOICES - 1})`);
  }
  return label;
}

/**
 * Choice position for a label, or undefined when the label is unknown or
 * beyond the last choice. Labels are case-sensitive.
 */
export function indexForLabel(label: string, choiceCount: number): number | undefined {
  const index = CHOICE_LABELS.indexOf(label);
  return index >= 0 && index < choiceCount ? index : undefined;
}

/**
 * Labels for the first `count` choices.
 */
export function labelsFor(count: number): string[] {
  return CHOICE_LABELS.slice(0, Math.max(0, count));
}
