/**
 * Error hierarchy and handler tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';

import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  IndexBuildError,
  ValidationError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
} from '../index.js';
import { EmbeddingMismatchError } from '../../search/errors.js';

const EMPTY_CORPUS = new ConfigError(
  'RAG is enabled but the corpus is empty',
  'Add text to the corpus file or run: mcq config set rag.enabled false'
);

let previousLevel: typeof chalk.level;

beforeEach(() => {
  previousLevel = chalk.level;
  chalk.level = 0;
});

afterEach(() => {
  chalk.level = previousLevel;
  vi.restoreAllMocks();
});

describe('exit codes', () => {
  it.each([
    ['ConfigError', EMPTY_CORPUS, 2],
    ['FileNotFoundError', new FileNotFoundError('questions.json'), 3],
    ['APIKeyError', new APIKeyError('OpenAI'), 4],
    ['IndexBuildError', new IndexBuildError('No chunk of corpus.txt could be embedded'), 5],
    [
      'EmbeddingMismatchError',
      new EmbeddingMismatchError({ source: 'query', expected: 1536, actual: 768 }),
      6,
    ],
    ['ValidationError', new ValidationError('Cannot compose prompt'), 1],
    ['a plain Error', new Error('socket hang up'), 1],
    ['a thrown string', 'quota exceeded', 1],
  ])('%s exits with %i', (_name, error, code) => {
    expect(getExitCode(error)).toBe(code);
  });

  it('keeps subclasses recognisable as CLIError', () => {
    const error = new IndexBuildError('No chunk of corpus.txt could be embedded');

    expect(error).toBeInstanceOf(CLIError);
    expect(error).toBeInstanceOf(IndexBuildError);
    expect(error.name).toBe('IndexBuildError');
  });
});

describe('error details', () => {
  it('names the environment variable for a missing key', () => {
    expect(new APIKeyError('OpenAI').hint).toBe('Set the OPENAI_API_KEY environment variable (or add it to .env)');
    expect(new APIKeyError('OpenAI-compatible', 'OPENAI_COMPATIBLE_API_KEY').hint).toBe(
      'Set the OPENAI_COMPATIBLE_API_KEY environment variable (or add it to .env)'
    );
  });

  it('lists chunking issues in the hint', () => {
    const error = new ValidationError('Invalid chunking options', [
      'chunk_size: must be a positive integer (got 0)',
      'chunk_overlap: must be a non-negative integer (got -1)',
    ]);

    expect(error.hint).toBe(
      'Issues:\n  chunk_size: must be a positive integer (got 0)\n  chunk_overlap: must be a non-negative integer (got -1)'
    );
  });

  it('keeps the last embedding failure as the cause', () => {
    const cause = new Error('429 Too Many Requests');

    expect(new IndexBuildError('No chunk of corpus.txt could be embedded', cause).cause).toBe(cause);
  });

  it('describes a dimension mismatch with both sizes', () => {
    const error = new EmbeddingMismatchError({ source: 'query', expected: 1536, actual: 768 });

    expect(error.message).toBe('Query embedding size does not match the corpus index (expected 1536, got 768)');
    expect(error.mismatch.source).toBe('query');
  });
});

describe('formatError', () => {
  it('prints the message and the hint', () => {
    expect(formatError(EMPTY_CORPUS)).toBe(
      'Error: RAG is enabled but the corpus is empty\n' +
        'Hint: Add text to the corpus file or run: mcq config set rag.enabled false'
    );
  });

  it('suggests --verbose for errors without a hint of their own', () => {
    expect(formatError(new Error('socket hang up'))).toBe(
      'Error: socket hang up\nHint: Run with --verbose for more details'
    );
  });

  it('prints thrown non-errors as text', () => {
    expect(formatError('quota exceeded')).toBe('Error: quota exceeded');
  });

  it('appends the stack in verbose mode', () => {
    const lines = formatError(EMPTY_CORPUS, { verbose: true }).split('\n');

    expect(lines.slice(0, 4)).toEqual([
      'Error: RAG is enabled but the corpus is empty',
      'Hint: Add text to the corpus file or run: mcq config set rag.enabled false',
      '',
      'Stack trace:',
    ]);
    expect(lines.length).toBeGreaterThan(4);
  });

  it('emits JSON with the exit code', () => {
    expect(JSON.parse(formatError(new FileNotFoundError('questions.json'), { json: true }))).toEqual({
      error: 'Path does not exist: questions.json',
      code: 3,
      hint: 'Check the path and try again',
    });
    expect(JSON.parse(formatError(new Error('socket hang up'), { json: true }))).toEqual({
      error: 'socket hang up',
      code: 1,
    });
    expect(JSON.parse(formatError(42, { json: true }))).toEqual({ error: '42', code: 1 });
  });
});

describe('handleError', () => {
  it('prints to stderr and exits with the error code', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    expect(() => handleError(new APIKeyError('OpenAI'))).toThrow('exit 4');
    expect(stderr).toHaveBeenCalledWith(
      'Error: OpenAI API key not configured\nHint: Set the OPENAI_API_KEY environment variable (or add it to .env)'
    );
    expect(exit).toHaveBeenCalledWith(4);
  });

  it('builds a global handler that keeps its options', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    const handler = createGlobalErrorHandler({ json: true });

    expect(() => handler(EMPTY_CORPUS)).toThrow('exit 2');
    expect(JSON.parse(String(stderr.mock.calls[0]?.[0]))).toMatchObject({ code: 2 });
  });
});
