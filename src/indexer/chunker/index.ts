/**
 * Chunker Module
 */

export { chunkText, normalizeCorpus, validateChunkingOptions } from './chunker.js';
