import { mkdir, open, stat, writeFile, type FileHandle } from 'fs/promises';
import { basename, join } from 'path';
import { computeBufferChecksum, computeFileChecksum } from '../checksum/index.js';
import {
  chunkFileName,
  chunksSubdirFor,
  manifestFileName,
  writeManifest,
  type ChunkRecord,
  type Manifest,
} from '../manifest/index.js';
import { compressBuffer } from '../../utils/compression.js';
import {
  InvalidChunkLimitError,
  NotAFileError,
  SplitSizeMismatchError,
  wrapError,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { SplitCallbacks, SplitOptions, SplitResult } from './splitting.types.js';

const logger = createLogger('split');

/**
 * Validates a chunk limit, failing fast instead of looping on a zero-byte read buffer
 */
export function assertValidChunkLimit(chunkLimit: number): void {
  if (!Number.isSafeInteger(chunkLimit) || chunkLimit <= 0) {
    throw new InvalidChunkLimitError(chunkLimit);
  }
}

/**
 * Reads from the current position until the buffer is full or the file ends
 *
 * @returns Number of bytes placed at the start of `buffer`
 */
async function readUpTo(handle: FileHandle, buffer: Buffer): Promise<number> {
  let filled = 0;
  while (filled < buffer.length) {
    const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, null);
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return filled;
}

/**
 * Writes one chunk file, verbatim or gzip-framed
 *
 * @returns Bytes written to disk
 */
async function writeChunk(chunkPath: string, data: Buffer, compress: boolean): Promise<number> {
  const payload = compress ? await compressBuffer(data) : data;
  try {
    await writeFile(chunkPath, payload);
  } catch (error) {
    throw wrapError(`Failed to create chunk file: ${chunkPath}`, error);
  }
  return payload.length;
}

/**
 * Splits a single file into numbered chunk files plus a manifest
 *
 * Chunks and the manifest are written to `<outputRoot>/<basename>_parts/`. A zero-length file
 * still produces one (empty) chunk. The manifest is written last; a failed split may leave
 * chunk files behind but never a manifest.
 *
 * @param filePath - File to split
 * @param options - Chunk limit, output root and compression flag
 * @param callbacks - Optional progress and message hooks
 * @returns The manifest and where it was saved
 */
export async function splitFile(
  filePath: string,
  options: SplitOptions,
  callbacks: SplitCallbacks = {}
): Promise<SplitResult> {
  const { chunkLimit, outputRoot, compress } = options;
  const { onProgress, onMessage } = callbacks;

  assertValidChunkLimit(chunkLimit);

  let originalSize: number;
  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) {
      throw new NotAFileError(filePath);
    }
    originalSize = stats.size;
  } catch (error) {
    if (error instanceof NotAFileError) throw error;
    throw wrapError(`Failed to open file: ${filePath}`, error);
  }

  const originalName = basename(filePath);
  const chunksSubdir = chunksSubdirFor(originalName);
  const chunksDir = join(outputRoot, chunksSubdir);

  try {
    await mkdir(chunksDir, { recursive: true });
  } catch (error) {
    throw wrapError(`Failed to create subdirectory: ${chunksDir}`, error);
  }

  const originalChecksum = await computeFileChecksum(filePath);
  logger.debug(`${originalName}: ${originalSize} bytes, checksum ${originalChecksum}`);

  onMessage?.(`Splitting '${originalName}'`);

  // Never allocate more than the file can fill; a short read still marks the final chunk
  const buffer = Buffer.alloc(Math.min(chunkLimit, Math.max(originalSize, 1)));
  const chunks: ChunkRecord[] = [];
  let totalBytesProcessed = 0;
  let sequence = 0;

  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (error) {
    throw wrapError(`Failed to open file: ${filePath}`, error);
  }

  try {
    for (;;) {
      const bytesRead = await readUpTo(handle, buffer);

      // End of input on a chunk boundary
      if (bytesRead === 0 && chunks.length > 0) break;

      sequence++;
      const name = chunkFileName(originalName, sequence);
      const data = buffer.subarray(0, bytesRead);
      const contentChecksum = computeBufferChecksum(data);
      const storedSize = await writeChunk(join(chunksDir, name), data, compress);

      chunks.push({ name, storedSize, contentChecksum });
      totalBytesProcessed += bytesRead;
      logger.debug(`${name}: ${bytesRead} bytes read, ${storedSize} bytes stored`);

      onProgress?.(totalBytesProcessed, originalSize);

      // Short read (including the empty-file case): this was the last chunk
      if (bytesRead < chunkLimit) break;
    }
  } finally {
    await handle.close();
  }

  onMessage?.(`'${originalName}' splitting complete`);

  if (totalBytesProcessed !== originalSize) {
    throw new SplitSizeMismatchError(originalSize, totalBytesProcessed);
  }

  const manifest: Manifest = {
    originalName,
    originalSize,
    chunkLimit,
    chunksSubdir,
    chunks,
    originalChecksum,
    compressed: compress,
  };

  const manifestPath = join(chunksDir, manifestFileName(originalName));
  await writeManifest(manifestPath, manifest);

  onMessage?.(`Split info for file '${originalName}' saved to: ${manifestPath}`);

  return { manifest, manifestPath, chunksDir };
}
