/**
 * Checksum Module
 * SHA-256 digests over buffers and files
 */

export { computeBufferChecksum, computeFileChecksum, verifyBufferChecksum } from './checksum.js';
