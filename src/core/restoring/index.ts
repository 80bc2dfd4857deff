/**
 * Restoring Module
 * Rebuilds an original file from its manifest and chunk files
 */

export { restoreFile } from './restorer.js';
export type {
  RestoreOptions,
  RestoreCallbacks,
  RestoreResult,
  IntegrityWarning,
} from './restoring.types.js';
