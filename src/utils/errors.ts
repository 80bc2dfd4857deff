/**
 * Shared error handling utilities
 */

/**
 * Formats error message from unknown error type
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps error with additional context, keeping the original as `cause`
 */
export function wrapError(context: string, error: unknown): Error {
  return new Error(`${context}: ${formatError(error)}`, { cause: error });
}

// ============================================================================
// Error Types
// ============================================================================

export type FilePartsErrorCode =
  | 'INVALID_CHUNK_LIMIT'
  | 'NOT_A_FILE'
  | 'SPLIT_SIZE_MISMATCH'
  | 'CHUNK_DIRECTORY_NOT_FOUND'
  | 'RESTORED_SIZE_MISMATCH'
  | 'CHECKSUM_MISMATCH'
  | 'MANIFEST_PARSE';

/**
 * Base class for failures raised by the split/restore engine itself
 * (as opposed to I/O errors coming from the filesystem)
 */
export class FilePartsError extends Error {
  readonly code: FilePartsErrorCode;

  constructor(code: FilePartsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidChunkLimitError extends FilePartsError {
  constructor(readonly chunkLimit: number) {
    super('INVALID_CHUNK_LIMIT', `Chunk limit must be a positive integer, got ${chunkLimit}`);
  }
}

export class NotAFileError extends FilePartsError {
  constructor(readonly path: string) {
    super('NOT_A_FILE', `Not a regular file: ${path}`);
  }
}

export class SplitSizeMismatchError extends FilePartsError {
  constructor(
    readonly expected: number,
    readonly actual: number
  ) {
    super(
      'SPLIT_SIZE_MISMATCH',
      `File size mismatch during splitting: Expected ${expected}, Actual ${actual}`
    );
  }
}

export class ChunkDirectoryNotFoundError extends FilePartsError {
  constructor(
    readonly originalName: string,
    readonly directory: string
  ) {
    super(
      'CHUNK_DIRECTORY_NOT_FOUND',
      `Chunk directory for file '${originalName}' not found: ${directory}`
    );
  }
}

export class RestoredSizeMismatchError extends FilePartsError {
  constructor(
    readonly expected: number,
    readonly actual: number
  ) {
    super(
      'RESTORED_SIZE_MISMATCH',
      `Restored file size mismatch: Expected ${expected}, Actual ${actual}`
    );
  }
}

export class ChecksumMismatchError extends FilePartsError {
  constructor(
    readonly subject: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(
      'CHECKSUM_MISMATCH',
      `Checksum mismatch for ${subject}! Expected: ${expected}, Actual: ${actual}`
    );
  }
}

export class ManifestParseError extends FilePartsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MANIFEST_PARSE', message, options);
  }
}
