/**
 * Splitting Types
 */

import type { Manifest } from '../manifest/index.js';

export interface SplitOptions {
  /** Maximum plaintext bytes per chunk; must be a positive integer */
  chunkLimit: number;
  /** Root directory; chunks go to `<outputRoot>/<basename>_parts` */
  outputRoot: string;
  /** Gzip each chunk file */
  compress: boolean;
}

/**
 * Optional notification hooks. Called synchronously and never awaited.
 */
export interface SplitCallbacks {
  /** After each chunk is written */
  onProgress?: (bytesDone: number, bytesTotal: number) => void;
  /** At start, finish and after the manifest is saved */
  onMessage?: (message: string) => void;
}

export interface SplitResult {
  manifest: Manifest;
  manifestPath: string;
  chunksDir: string;
}
