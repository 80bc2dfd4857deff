/**
 * file-parts
 * Split large files into checksummed chunks and restore them byte-for-byte
 */

export {
  computeBufferChecksum,
  computeFileChecksum,
  verifyBufferChecksum,
} from './core/checksum/index.js';
export {
  chunksSubdirFor,
  chunkFileName,
  manifestFileName,
  manifestPathFor,
  toManifestFile,
  fromManifestFile,
  serializeManifest,
  parseManifest,
  readManifest,
  writeManifest,
  ManifestFileSchema,
} from './core/manifest/index.js';
export type { ChunkRecord, Manifest, ManifestFile, ChunkInfo } from './core/manifest/index.js';
export { splitFile, assertValidChunkLimit } from './core/splitting/index.js';
export type { SplitOptions, SplitCallbacks, SplitResult } from './core/splitting/index.js';
export { restoreFile } from './core/restoring/index.js';
export type {
  RestoreOptions,
  RestoreCallbacks,
  RestoreResult,
  IntegrityWarning,
} from './core/restoring/index.js';
export { splitFiles, restoreFiles } from './core/batch/index.js';
export type { SplitFileHooks, RestoreFileHooks } from './core/batch/index.js';
export {
  FilePartsError,
  InvalidChunkLimitError,
  NotAFileError,
  SplitSizeMismatchError,
  ChunkDirectoryNotFoundError,
  RestoredSizeMismatchError,
  ChecksumMismatchError,
  ManifestParseError,
} from './utils/errors.js';
export type { FilePartsErrorCode } from './utils/errors.js';
export type { Logger } from './utils/logger.js';
