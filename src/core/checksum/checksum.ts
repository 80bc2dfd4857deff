import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { CHECKSUM_ALGORITHM, CHECKSUM_READ_BLOCK_SIZE } from '../../utils/constants.js';
import { wrapError } from '../../utils/errors.js';

/**
 * Calculates the SHA-256 checksum of a buffer
 *
 * @param data - Bytes to hash
 * @returns Lowercase hex digest (64 characters)
 */
export function computeBufferChecksum(data: Uint8Array): string {
  return createHash(CHECKSUM_ALGORITHM).update(data).digest('hex');
}

/**
 * Calculates the SHA-256 checksum of a file's content
 *
 * Streams the file in fixed-size blocks so memory use does not grow with file size.
 *
 * @param filePath - Path to an existing, readable file
 * @returns Lowercase hex digest (64 characters)
 */
export async function computeFileChecksum(filePath: string): Promise<string> {
  const hash = createHash(CHECKSUM_ALGORITHM);
  const stream = createReadStream(filePath, { highWaterMark: CHECKSUM_READ_BLOCK_SIZE });

  try {
    for await (const block of stream) {
      if (!Buffer.isBuffer(block)) {
        throw new TypeError(`Unexpected non-binary block while reading ${filePath}`);
      }
      hash.update(block);
    }
  } catch (error) {
    throw wrapError(`Failed to open file to calculate checksum: ${filePath}`, error);
  }

  return hash.digest('hex');
}

/**
 * Checks a buffer against an expected checksum
 */
export function verifyBufferChecksum(data: Uint8Array, expected: string): boolean {
  return computeBufferChecksum(data) === expected;
}
