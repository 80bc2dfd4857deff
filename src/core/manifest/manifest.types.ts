/**
 * Manifest Types
 * Split record shared by the splitter and the restorer
 */

/**
 * One entry per chunk file written during a split
 */
export interface ChunkRecord {
  /** Chunk file name inside the chunks subdirectory (e.g. "report.txt-001") */
  name: string;
  /** Bytes on disk; the compressed size when the split used compression */
  storedSize: number;
  /** SHA-256 of the chunk's uncompressed bytes, null when not computed */
  contentChecksum: string | null;
}

/**
 * Everything needed to rebuild one original file from its chunks
 */
export interface Manifest {
  /** Basename of the original file */
  originalName: string;
  /** Total size of the original file in bytes */
  originalSize: number;
  /** Maximum plaintext bytes per chunk used during the split */
  chunkLimit: number;
  /** Directory holding the chunk files, relative to the chunks root */
  chunksSubdir: string;
  /** Chunks in reconstruction order */
  chunks: ChunkRecord[];
  /** SHA-256 of the whole original file */
  originalChecksum: string;
  /** Whether every chunk is gzip-compressed */
  compressed: boolean;
}
