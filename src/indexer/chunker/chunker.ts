/**
 * Corpus Chunker
 *
 * Splits reference text into overlapping character windows. A window that
 * would cut the text mid-stream is pulled back to the last paragraph break,
 * then sentence end, then whitespace found in its back half. Consecutive
 * windows share up to `chunkOverlap` characters, starting on a word.
 */

import { ValidationError } from '../../errors/index.js';
import type { ChunkingOptions, TextChunk } from '../types.js';

const SENTENCE_END = /[.!?]["')\]]?(?=\s)/g;

function isSpace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

/**
 * Collapse line endings and runs of blank lines; trim the ends.
 */
export function normalizeCorpus(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(/\n{3,}/g, '\n\n').trim();
}

/**
 * @throws ValidationError when the sizes cannot produce forward progress
 */
export function validateChunkingOptions(options: ChunkingOptions): void {
  const issues: string[] = [];
  if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
    issues.push(`chunk_size: must be a positive integer (got ${options.chunkSize})`);
  }
  if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0) {
    issues.push(`chunk_overlap: must be a non-negative integer (got ${options.chunkOverlap})`);
  } else if (options.chunkOverlap >= options.chunkSize) {
    issues.push(
      `chunk_overlap: must be smaller than chunk_size (${options.chunkOverlap} >= ${options.chunkSize})`
    );
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid chunking options', issues);
  }
}

/**
 * Find where a window [start, end) should stop. Only breaks in the back
 * half of the window are taken; otherwise the hard limit stands.
 */
function findBreak(text: string, start: number, end: number): number {
  const window = text.slice(start, end);
  const minPos = Math.floor(window.length / 2);

  const paragraph = window.lastIndexOf('\n\n');
  if (paragraph >= minPos) {
    return start + paragraph + 2;
  }

  let sentenceEnd = -1;
  for (const match of window.matchAll(SENTENCE_END)) {
    sentenceEnd = (match.index ?? 0) + match[0].length;
  }
  if (sentenceEnd >= minPos) {
    return start + sentenceEnd;
  }

  for (let i = window.length - 1; i >= Math.max(minPos, 1); i--) {
    if (isSpace(window[i])) {
      return start + i;
    }
  }

  return end;
}

/**
 * Split text into chunks of at most `chunkSize` characters.
 *
 * Whitespace-only windows are dropped; the trailing partial window is kept.
 * Offsets point at the trimmed chunk text inside `text`.
 *
 * @example
 * ```ts
 * chunkText('Alpha beta.\n\nGamma delta.', { chunkSize: 20, chunkOverlap: 0 });
 * // [{ index: 0, start: 0, end: 11, text: 'Alpha beta.' },
 * //  { index: 1, start: 13, end: 25, text: 'Gamma delta.' }]
 * ```
 */
export function chunkText(text: string, options: ChunkingOptions): TextChunk[] {
  validateChunkingOptions(options);
  const { chunkSize, chunkOverlap } = options;
  const chunks: TextChunk[] = [];

  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (end < text.length) {
      end = findBreak(text, start, end);
    }

    const slice = text.slice(start, end);
    const trimmed = slice.trim();
    if (trimmed.length > 0) {
      const chunkStart = start + (slice.length - slice.trimStart().length);
      chunks.push({
        index: chunks.length,
        start: chunkStart,
        end: chunkStart + trimmed.length,
        text: trimmed,
      });
    }

    if (end >= text.length) break;

    const overlapStart = end - chunkOverlap;
    let next = overlapStart;
    if (next <= start) {
      next = end;
    } else {
      // Start the overlap on a word boundary, or mid-word when the overlap has none
      while (next < end && !isSpace(text[next - 1])) next++;
      if (next >= end) next = overlapStart;
    }
    start = next;
  }

  return chunks;
}
