/**
 * Manifest Module
 * Split record types, on-disk layout and naming rules
 */

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
} from './manifest.js';
export { ManifestFileSchema, ChunkInfoSchema } from './manifest.schema.js';
export type { ManifestFile, ChunkInfo } from './manifest.schema.js';
export type { ChunkRecord, Manifest } from './manifest.types.js';
