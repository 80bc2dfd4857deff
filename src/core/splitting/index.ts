/**
 * Splitting Module
 * Carves a file into bounded-size chunk files and records a manifest
 */

export { splitFile, assertValidChunkLimit } from './splitter.js';
export type { SplitOptions, SplitCallbacks, SplitResult } from './splitting.types.js';
