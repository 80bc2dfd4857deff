import { basename } from 'path';
import { z } from 'zod';

const ByteCountSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

// File and directory names are joined onto a root on restore and must stay inside it
const PlainNameSchema = z
  .string()
  .min(1)
  .refine((name) => name === basename(name) && name !== '.' && name !== '..', {
    message: 'Must be a plain file name without directory components',
  });

export const ChunkInfoSchema = z.object({
  chunk_filename: PlainNameSchema,
  chunk_size: ByteCountSchema,
  chunk_checksum: z.string().nullable(),
});

export type ChunkInfo = z.infer<typeof ChunkInfoSchema>;

// On-disk manifest layout. Keys are the interchange format and must not be renamed.
export const ManifestFileSchema = z.object({
  original_filename: PlainNameSchema,
  original_file_size: ByteCountSchema,
  chunk_limit: ByteCountSchema.positive(),
  chunks_sub_dir: PlainNameSchema,
  chunks: z.array(ChunkInfoSchema).min(1),
  original_checksum: z.string(),
  is_compressed: z.boolean(),
});

export type ManifestFile = z.infer<typeof ManifestFileSchema>;
