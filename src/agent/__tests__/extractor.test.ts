/**
 * Answer Extractor Tests
 */

import { describe, it, expect } from 'vitest';

import {
  extractAnswer,
  extractAnswerIndex,
  normalizeText,
  diceSimilarity,
  MAX_RESPONSE_CHARS,
} from '../extractor.js';
import { NO_MATCH } from '../types.js';

const CITIES = ['Paris', 'London', 'Berlin', 'Madrid'];
const GREEK = ['alpha', 'beta', 'gamma', 'delta'];
const BREEDING = ['Genetically modified organisms', 'Selective breeding', 'Natural mutation', 'Hybridization'];

describe('extractAnswer', () => {
  describe('label strategy', () => {
    it('takes the final answer line over earlier mentions', () => {
      const response = 'I think A is wrong because of X. Final answer: C';

      expect(extractAnswer(response, ['x', 'y', 'C-text', 'z'])).toEqual({
        kind: 'choice',
        index: 2,
        strategy: 'label',
      });
    });

    it('reads "the answer is B."', () => {
      expect(extractAnswerIndex('The answer is B.', CITIES)).toBe(1);
    });

    it('takes the last cue of a group', () => {
      expect(extractAnswerIndex('Option A looks plausible, but option D is better.', CITIES)).toBe(3);
    });

    it('prefers a final answer cue over a later weaker cue', () => {
      expect(extractAnswerIndex('Final answer: B\nOption C was close.', CITIES)).toBe(1);
    });

    it('does not read the article "a" as a label', () => {
      expect(extractAnswerIndex("The answer is a tricky one, but I'd pick (C)", CITIES)).toBe(2);
    });

    it('takes a lowercase label after a final answer cue', () => {
      expect(extractAnswer('final answer: c', GREEK)).toEqual({ kind: 'choice', index: 2, strategy: 'label' });
    });

    it('still reads "a" after a final answer cue as prose when a word follows', () => {
      expect(extractAnswerIndex('The final answer is a close call. (D)', CITIES)).toBe(3);
    });

    it('keeps weaker cues to capital labels', () => {
      expect(extractAnswerIndex('the answer is c', ['x', 'y', 'z', 'w'])).toBe(NO_MATCH);
    });

    it('does not read the pronoun "I" as a label with ten choices', () => {
      const tenChoices = Array.from({ length: 10 }, (_, i) => `choice ${i + 1}`);

      expect(extractAnswer('Answer: I think it is B', tenChoices)).toEqual({
        kind: 'choice',
        index: 1,
        strategy: 'label',
      });
    });

    it('reads I as a label when it stands alone', () => {
      const tenChoices = Array.from({ length: 10 }, (_, i) => `choice ${i + 1}`);

      expect(extractAnswerIndex('Final answer: I', tenChoices)).toBe(8);
    });

    it('reads a bold label', () => {
      expect(extractAnswerIndex('**B**', CITIES)).toBe(1);
    });

    it('ranks labels above numbers', () => {
      expect(extractAnswerIndex('Answer 2 is tempting. Final answer: D', CITIES)).toBe(3);
    });
  });

  describe('numeric strategy', () => {
    it('reads a bare integer as zero-based by default', () => {
      expect(extractAnswer('2', CITIES)).toEqual({ kind: 'choice', index: 2, strategy: 'numeric' });
    });

    it('reads a bare integer as one-based when configured', () => {
      expect(extractAnswerIndex('2', CITIES, { numbering: 'one-based' })).toBe(1);
    });

    it('takes the last in-range integer', () => {
      expect(extractAnswerIndex('Between 1 and 7, I choose 3', CITIES)).toBe(3);
    });

    it('ignores decimals', () => {
      expect(extractAnswerIndex('The value is 3.5', GREEK)).toBe(NO_MATCH);
    });
  });

  describe('fuzzy strategy', () => {
    it('matches an echoed choice', () => {
      const response = 'The technique described is genetically modified organisms.';

      expect(extractAnswer(response, BREEDING)).toEqual({
        kind: 'choice',
        index: 0,
        strategy: 'fuzzy',
        score: 1,
      });
    });

    it('matches a misspelled choice above the threshold', () => {
      const result = extractAnswer('Selectve breding', BREEDING);

      expect(result.kind).toBe('choice');
      if (result.kind === 'choice') {
        expect(result.index).toBe(1);
        expect(result.strategy).toBe('fuzzy');
        expect(result.score).toBeCloseTo(0.875, 10);
      }
    });

    it('refuses the match when the threshold is higher', () => {
      expect(extractAnswerIndex('Selectve breding', BREEDING, { fuzzyThreshold: 0.9 })).toBe(NO_MATCH);
    });

    it('gives no match when two choices are contained equally', () => {
      expect(extractAnswer('cat and dog', ['cat', 'dog'])).toEqual({ kind: 'no_match' });
    });

    it('prefers the longer contained choice', () => {
      expect(extractAnswerIndex('it was dark blue', ['blue', 'dark blue'])).toBe(1);
    });
  });

  describe('no match', () => {
    it('returns NO_MATCH for a refusal', () => {
      expect(extractAnswerIndex('I cannot determine the answer', CITIES)).toBe(NO_MATCH);
    });

    it('ignores labels beyond the choice count', () => {
      expect(extractAnswerIndex('Final answer: E', CITIES)).toBe(NO_MATCH);
    });

    it('handles blank and non-string responses', () => {
      expect(extractAnswer('', CITIES)).toEqual({ kind: 'no_match' });
      expect(extractAnswer('   \n', CITIES)).toEqual({ kind: 'no_match' });
      expect(extractAnswer(42, CITIES)).toEqual({ kind: 'no_match' });
      expect(extractAnswer(null, CITIES)).toEqual({ kind: 'no_match' });
    });

    it('handles an empty choice list', () => {
      expect(extractAnswer('Final answer: A', [])).toEqual({ kind: 'no_match' });
    });

    it('only reads the tail of an oversized response', () => {
      const response = 'Final answer: B' + ' filler'.repeat(10_000);
      expect(response.length).toBeGreaterThan(MAX_RESPONSE_CHARS);

      expect(extractAnswerIndex(response, GREEK)).toBe(NO_MATCH);
    });
  });

  it('gives the same result for the same input', () => {
    const response = 'Option A looks plausible, but option D is better.';

    expect(extractAnswer(response, CITIES)).toEqual(extractAnswer(response, CITIES));
  });
});

describe('normalizeText', () => {
  it('lowercases and replaces punctuation runs with one space', () => {
    expect(normalizeText('  Hello,   World!! (Again)  ')).toBe('hello world again');
  });

  it('keeps letters from other scripts', () => {
    expect(normalizeText('Ångström-Élan')).toBe('ångström élan');
  });
});

describe('diceSimilarity', () => {
  it('is 1 for identical strings', () => {
    expect(diceSimilarity('night', 'night')).toBe(1);
  });

  it('is 0 when no bigram is shared', () => {
    expect(diceSimilarity('abc', 'xyz')).toBe(0);
  });

  it('counts shared bigrams', () => {
    // night: ni ig gh ht / nacht: na ac ch ht -> 1 shared
    expect(diceSimilarity('night', 'nacht')).toBe(0.25);
  });

  it('is 0 for strings shorter than two characters', () => {
    expect(diceSimilarity('a', 'ab')).toBe(0);
  });
});
