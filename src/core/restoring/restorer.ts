import { mkdir, open, readFile, stat, type FileHandle } from 'fs/promises';
import { join } from 'path';
import { pipeline } from 'stream/promises';
import { computeBufferChecksum, computeFileChecksum } from '../checksum/index.js';
import type { Manifest } from '../manifest/index.js';
import { decompressBuffer } from '../../utils/compression.js';
import {
  ChecksumMismatchError,
  ChunkDirectoryNotFoundError,
  RestoredSizeMismatchError,
  wrapError,
} from '../../utils/errors.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import type {
  IntegrityWarning,
  RestoreCallbacks,
  RestoreOptions,
  RestoreResult,
} from './restoring.types.js';

const defaultLogger = createLogger('restore');

async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw wrapError(`Failed to inspect chunk directory: ${path}`, error);
  }
}

/**
 * Reads a chunk file fully into memory, gunzipping it when the split was compressed
 */
async function readChunk(chunkPath: string, compressed: boolean): Promise<Buffer> {
  let stored: Buffer;
  try {
    stored = await readFile(chunkPath);
  } catch (error) {
    throw wrapError(`Failed to open chunk file: ${chunkPath}`, error);
  }

  if (!compressed) return stored;

  try {
    return await decompressBuffer(stored);
  } catch (error) {
    throw wrapError(`Failed to decompress chunk file: ${chunkPath}`, error);
  }
}

/**
 * Records a checksum mismatch, or raises it when running strict
 */
function reportMismatch(
  warning: IntegrityWarning,
  subject: string,
  strict: boolean,
  logger: Logger,
  warnings: IntegrityWarning[]
): void {
  if (strict) {
    throw new ChecksumMismatchError(subject, warning.expected, warning.actual);
  }
  logger.warn(
    `Warning: Checksum mismatch for ${subject}! Expected: ${warning.expected}, Actual: ${warning.actual}`
  );
  warnings.push(warning);
}

/**
 * Rebuilds an original file from the chunks a manifest describes
 *
 * Chunks are read, decoded and appended strictly in manifest order. Checksum mismatches
 * (per chunk or whole file) are logged and returned as warnings unless `strict` is set;
 * a missing chunk directory, an unreadable chunk or a wrong final size always fail.
 *
 * @param manifest - Validated manifest of the file to rebuild
 * @param options - Chunks root, output directory and integrity policy
 * @param callbacks - Optional progress and message hooks
 * @returns Output path, bytes written and any integrity warnings
 */
export async function restoreFile(
  manifest: Manifest,
  options: RestoreOptions,
  callbacks: RestoreCallbacks = {}
): Promise<RestoreResult> {
  const { chunksRoot, outputDir, strict = false, logger = defaultLogger } = options;
  const { onProgress, onMessage } = callbacks;

  const outputPath = join(outputDir, manifest.originalName);
  const chunksDir = join(chunksRoot, manifest.chunksSubdir);
  const warnings: IntegrityWarning[] = [];
  let totalWritten = 0;

  let output: FileHandle;
  try {
    await mkdir(outputDir, { recursive: true });
    output = await open(outputPath, 'w');
  } catch (error) {
    throw wrapError(`Failed to create output file: ${outputPath}`, error);
  }

  onMessage?.(`Restoring '${manifest.originalName}'`);

  async function* decodedChunks(): AsyncGenerator<Buffer> {
    if (!(await directoryExists(chunksDir))) {
      throw new ChunkDirectoryNotFoundError(manifest.originalName, chunksDir);
    }

    for (const chunk of manifest.chunks) {
      const data = await readChunk(join(chunksDir, chunk.name), manifest.compressed);

      if (chunk.contentChecksum !== null) {
        const actual = computeBufferChecksum(data);
        if (actual !== chunk.contentChecksum) {
          reportMismatch(
            {
              kind: 'chunk-checksum',
              chunkName: chunk.name,
              expected: chunk.contentChecksum,
              actual,
            },
            `chunk '${chunk.name}'`,
            strict,
            logger,
            warnings
          );
        }
      }

      yield data;
      totalWritten += data.length;
      onProgress?.(totalWritten, manifest.originalSize);
    }
  }

  // The write stream owns the handle and closes it on success and on failure
  await pipeline(decodedChunks(), output.createWriteStream());

  onMessage?.(`'${manifest.originalName}' restoration complete`);

  const restoredSize = (await stat(outputPath)).size;
  if (restoredSize !== manifest.originalSize) {
    throw new RestoredSizeMismatchError(manifest.originalSize, restoredSize);
  }

  const actualChecksum = await computeFileChecksum(outputPath);
  if (actualChecksum !== manifest.originalChecksum) {
    reportMismatch(
      { kind: 'file-checksum', expected: manifest.originalChecksum, actual: actualChecksum },
      `restored file '${manifest.originalName}'`,
      strict,
      logger,
      warnings
    );
  }

  logger.debug(`${manifest.originalName}: ${totalWritten} bytes written to ${outputPath}`);

  return { outputPath, bytesWritten: totalWritten, warnings };
}
