import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync } from 'fs';
import { readFile, rm } from 'fs/promises';
import { join } from 'path';
import { restoreFiles, splitFiles } from '../core/batch/index.js';
import {
  createMockLogger,
  createTempTestDir,
  createTestFile,
  makeContent,
} from './helpers/fixtures.js';

describe('Batch helpers', () => {
  let testDir: string;
  let outputRoot: string;

  beforeEach(async () => {
    testDir = await createTempTestDir('batch-test');
    outputRoot = join(testDir, 'parts');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should split and restore several files in order', async () => {
    const first = makeContent(100);
    const second = Buffer.from('second file contents');
    const firstPath = await createTestFile(testDir, 'first.bin', first);
    const secondPath = await createTestFile(testDir, 'second.txt', second);
    const order: string[] = [];

    const splits = await splitFiles(
      [firstPath, secondPath],
      { chunkLimit: 32, outputRoot, compress: true },
      (_filePath, index) => ({ onMessage: (message) => order.push(`${index}:${message}`) })
    );

    assert.deepStrictEqual(
      splits.map((result) => result.manifest.chunks.length),
      [4, 1]
    );
    assert.deepStrictEqual(order.slice(0, 2), [
      "0:Splitting 'first.bin'",
      "0:'first.bin' splitting complete",
    ]);
    assert.strictEqual(order[3], "1:Splitting 'second.txt'");

    const outputDir = join(testDir, 'restored');
    const restores = await restoreFiles(
      splits.map((result) => result.manifestPath),
      { chunksRoot: outputRoot, outputDir, logger: createMockLogger() }
    );

    assert.deepStrictEqual(
      restores.map((result) => result.outputPath),
      [join(outputDir, 'first.bin'), join(outputDir, 'second.txt')]
    );
    assert.deepStrictEqual(await readFile(join(outputDir, 'first.bin')), first);
    assert.deepStrictEqual(await readFile(join(outputDir, 'second.txt')), second);
  });

  it('should stop splitting at the first failure', async () => {
    const goodPath = await createTestFile(testDir, 'good.bin', makeContent(10));
    const laterPath = await createTestFile(testDir, 'later.bin', makeContent(10));

    await assert.rejects(
      splitFiles([goodPath, join(testDir, 'missing.bin'), laterPath], {
        chunkLimit: 4,
        outputRoot,
        compress: false,
      }),
      { message: /^Failed to open file: / }
    );

    assert.strictEqual(existsSync(join(outputRoot, 'good.bin_parts', 'good.bin.json')), true);
    assert.strictEqual(existsSync(join(outputRoot, 'later.bin_parts')), false);
  });

  it('should report each completion before the next file starts', async () => {
    const firstPath = await createTestFile(testDir, 'one.bin', makeContent(9));
    const secondPath = await createTestFile(testDir, 'two.bin', makeContent(3));
    const events: string[] = [];

    await splitFiles(
      [firstPath, secondPath],
      { chunkLimit: 4, outputRoot, compress: false },
      (filePath, index) => {
        events.push(`start ${index} ${filePath}`);
        return {
          onComplete: (result) =>
            events.push(`done ${result.manifest.originalName} ${result.manifest.chunks.length}`),
        };
      }
    );

    assert.deepStrictEqual(events, [
      `start 0 ${firstPath}`,
      'done one.bin 3',
      `start 1 ${secondPath}`,
      'done two.bin 1',
    ]);
  });

  it('should not report completion for a failed file or build hooks past it', async () => {
    const goodPath = await createTestFile(testDir, 'good.bin', makeContent(10));
    const missingPath = join(testDir, 'missing.bin');
    const laterPath = await createTestFile(testDir, 'later.bin', makeContent(10));
    const started: string[] = [];
    const completed: string[] = [];

    await assert.rejects(
      splitFiles(
        [goodPath, missingPath, laterPath],
        { chunkLimit: 4, outputRoot, compress: false },
        (filePath) => {
          started.push(filePath);
          return { onComplete: (result) => completed.push(result.manifest.originalName) };
        }
      ),
      { message: /^Failed to open file: / }
    );

    assert.deepStrictEqual(started, [goodPath, missingPath]);
    assert.deepStrictEqual(completed, ['good.bin']);
  });

  it('should hand each restore result to its completion hook', async () => {
    const content = makeContent(20);
    const filePath = await createTestFile(testDir, 'data.bin', content);
    const [split] = await splitFiles([filePath], { chunkLimit: 8, outputRoot, compress: false });
    const outputDir = join(testDir, 'restored');
    const completed: string[] = [];

    const results = await restoreFiles(
      [split.manifestPath],
      { chunksRoot: outputRoot, outputDir, logger: createMockLogger() },
      (manifestPath) => ({
        onComplete: (result) =>
          completed.push(`${manifestPath} -> ${result.outputPath} ${result.bytesWritten}`),
      })
    );

    assert.deepStrictEqual(completed, [
      `${split.manifestPath} -> ${join(outputDir, 'data.bin')} 20`,
    ]);
    assert.strictEqual(results.length, 1);
  });

  it('should stop restoring at an unreadable manifest', async () => {
    await assert.rejects(
      restoreFiles([join(testDir, 'absent.json')], {
        chunksRoot: outputRoot,
        outputDir: join(testDir, 'restored'),
      }),
      { message: /^Failed to read restore info file: / }
    );
  });
});
