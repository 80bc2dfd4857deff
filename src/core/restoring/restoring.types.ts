/**
 * Restoring Types
 */

import type { Logger } from '../../utils/logger.js';

export interface RestoreOptions {
  /** Root directory that contains the manifest's chunks subdirectory */
  chunksRoot: string;
  /** Directory the original file is rebuilt into (created if missing) */
  outputDir: string;
  /**
   * Treat checksum mismatches as fatal. Off by default: mismatches are logged
   * and the restore completes. Size mismatches are always fatal.
   */
  strict?: boolean;
  /** Receives integrity warnings; defaults to the `restore` console logger */
  logger?: Logger;
}

/**
 * Optional notification hooks. Called synchronously and never awaited.
 */
export interface RestoreCallbacks {
  /** After each chunk is appended to the output */
  onProgress?: (bytesDone: number, bytesTotal: number) => void;
  /** At start and finish */
  onMessage?: (message: string) => void;
}

export type IntegrityWarning =
  | {
      kind: 'chunk-checksum';
      chunkName: string;
      expected: string;
      actual: string;
    }
  | {
      kind: 'file-checksum';
      expected: string;
      actual: string;
    };

export interface RestoreResult {
  outputPath: string;
  bytesWritten: number;
  /** Checksum mismatches reported during the restore; empty when the output verified */
  warnings: IntegrityWarning[];
}
