/**
 * Shared constants across the application
 */

// ============================================================================
// File Naming
// ============================================================================

export const CHUNKS_SUBDIR_SUFFIX = '_parts';
export const MANIFEST_EXTENSION = '.json';
export const CHUNK_SEQUENCE_SEPARATOR = '-';
export const CHUNK_SEQUENCE_PAD_LENGTH = 3; // report.txt-001, never truncated past 999

// ============================================================================
// Chunking Configuration
// ============================================================================

export const DEFAULT_CHUNK_LIMIT = 100 * 1024 * 1024; // 100MB

// ============================================================================
// Checksums
// ============================================================================

export const CHECKSUM_ALGORITHM = 'sha256';
export const CHECKSUM_READ_BLOCK_SIZE = 8 * 1024; // 8KB

// SHA-256 of zero bytes
export const EMPTY_CHECKSUM = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

// ============================================================================
// Manifest Serialization
// ============================================================================

export const MANIFEST_JSON_INDENT = 2;
