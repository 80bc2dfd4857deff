import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ZodError } from 'zod';
import {
  CHUNK_SEQUENCE_PAD_LENGTH,
  CHUNK_SEQUENCE_SEPARATOR,
  CHUNKS_SUBDIR_SUFFIX,
  MANIFEST_EXTENSION,
  MANIFEST_JSON_INDENT,
} from '../../utils/constants.js';
import { ManifestParseError, formatError, wrapError } from '../../utils/errors.js';
import { ManifestFileSchema, type ManifestFile } from './manifest.schema.js';
import type { Manifest } from './manifest.types.js';

// ============================================================================
// Naming
// ============================================================================

/**
 * Name of the directory that holds every chunk of `originalName`
 */
export function chunksSubdirFor(originalName: string): string {
  return `${originalName}${CHUNKS_SUBDIR_SUFFIX}`;
}

/**
 * Chunk file name for a 1-based sequence number
 *
 * Pads to three digits; larger sequence numbers keep all their digits (`name-1000`).
 */
export function chunkFileName(originalName: string, sequence: number): string {
  const padded = String(sequence).padStart(CHUNK_SEQUENCE_PAD_LENGTH, '0');
  return `${originalName}${CHUNK_SEQUENCE_SEPARATOR}${padded}`;
}

export function manifestFileName(originalName: string): string {
  return `${originalName}${MANIFEST_EXTENSION}`;
}

/**
 * Where a split of `originalName` under `outputRoot` saves its manifest
 */
export function manifestPathFor(outputRoot: string, originalName: string): string {
  return join(outputRoot, chunksSubdirFor(originalName), manifestFileName(originalName));
}

// ============================================================================
// Wire Conversion
// ============================================================================

export function toManifestFile(manifest: Manifest): ManifestFile {
  return {
    original_filename: manifest.originalName,
    original_file_size: manifest.originalSize,
    chunk_limit: manifest.chunkLimit,
    chunks_sub_dir: manifest.chunksSubdir,
    chunks: manifest.chunks.map((chunk) => ({
      chunk_filename: chunk.name,
      chunk_size: chunk.storedSize,
      chunk_checksum: chunk.contentChecksum,
    })),
    original_checksum: manifest.originalChecksum,
    is_compressed: manifest.compressed,
  };
}

export function fromManifestFile(file: ManifestFile): Manifest {
  return {
    originalName: file.original_filename,
    originalSize: file.original_file_size,
    chunkLimit: file.chunk_limit,
    chunksSubdir: file.chunks_sub_dir,
    chunks: file.chunks.map((chunk) => ({
      name: chunk.chunk_filename,
      storedSize: chunk.chunk_size,
      contentChecksum: chunk.chunk_checksum,
    })),
    originalChecksum: file.original_checksum,
    compressed: file.is_compressed,
  };
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeManifest(manifest: Manifest): string {
  return JSON.stringify(toManifestFile(manifest), null, MANIFEST_JSON_INDENT);
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parses and validates manifest JSON
 *
 * @throws ManifestParseError when the text is not JSON or does not match the manifest layout
 */
export function parseManifest(json: string): Manifest {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ManifestParseError(`Manifest is not valid JSON: ${formatError(error)}`, {
      cause: error,
    });
  }

  const result = ManifestFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ManifestParseError(`Invalid manifest: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }

  return fromManifestFile(result.data);
}

export async function readManifest(manifestPath: string): Promise<Manifest> {
  let json: string;
  try {
    json = await readFile(manifestPath, 'utf-8');
  } catch (error) {
    throw wrapError(`Failed to read restore info file: ${manifestPath}`, error);
  }

  try {
    return parseManifest(json);
  } catch (error) {
    if (error instanceof ManifestParseError) {
      throw new ManifestParseError(`${manifestPath}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

export async function writeManifest(manifestPath: string, manifest: Manifest): Promise<void> {
  try {
    await writeFile(manifestPath, serializeManifest(manifest), 'utf-8');
  } catch (error) {
    throw wrapError(`Failed to save split info JSON file: ${manifestPath}`, error);
  }
}
