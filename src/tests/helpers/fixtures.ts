import { mkdtemp, mkdir, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { mock } from 'node:test';

// Helper to create a temporary test directory
export async function createTempTestDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

// Deterministic, non-repeating-per-kilobyte test content
export function makeContent(size: number): Buffer {
  const buffer = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    buffer[i] = (i * 7 + 3) % 251;
  }
  return buffer;
}

// Helper to create a test file (and its parent directories)
export async function createTestFile(dir: string, name: string, content: Buffer): Promise<string> {
  const fullPath = join(dir, name);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content);
  return fullPath;
}

export function createMockLogger() {
  return {
    debug: mock.fn(),
    info: mock.fn(),
    warn: mock.fn(),
    error: mock.fn(),
  };
}
