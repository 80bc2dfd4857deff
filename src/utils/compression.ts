/**
 * Gzip framing for chunk files
 */

import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export function compressBuffer(data: Uint8Array): Promise<Buffer> {
  return gzipAsync(data);
}

export function decompressBuffer(data: Uint8Array): Promise<Buffer> {
  return gunzipAsync(data);
}
