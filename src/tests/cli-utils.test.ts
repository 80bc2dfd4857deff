import { describe, it } from 'node:test';
import assert from 'node:assert';
import { formatBytes, parseSizeInput, percentOf, truncateFileName } from '../cli/utils.js';

describe('CLI utilities', () => {
  describe('formatBytes', () => {
    it('should format byte counts with binary units', () => {
      assert.strictEqual(formatBytes(0), '0 B');
      assert.strictEqual(formatBytes(512), '512 B');
      assert.strictEqual(formatBytes(1024), '1 KB');
      assert.strictEqual(formatBytes(1536), '1.5 KB');
      assert.strictEqual(formatBytes(104857600), '100 MB');
      assert.strictEqual(formatBytes(2 * 1024 ** 4), '2 TB');
    });
  });

  describe('parseSizeInput', () => {
    it('should accept plain byte counts', () => {
      assert.strictEqual(parseSizeInput('104857600'), 104857600);
      assert.strictEqual(parseSizeInput(' 42 '), 42);
      assert.strictEqual(parseSizeInput('0'), 0);
    });

    it('should accept unit suffixes in any case', () => {
      assert.strictEqual(parseSizeInput('512K'), 512 * 1024);
      assert.strictEqual(parseSizeInput('100MB'), 100 * 1024 * 1024);
      assert.strictEqual(parseSizeInput('2 MiB'), 2 * 1024 * 1024);
      assert.strictEqual(parseSizeInput('1.5g'), 1610612736);
      assert.strictEqual(parseSizeInput('64b'), 64);
    });

    it('should reject anything else', () => {
      assert.throws(() => parseSizeInput('abc'), { message: 'Invalid size: abc' });
      assert.throws(() => parseSizeInput('-5'), { message: 'Invalid size: -5' });
      assert.throws(() => parseSizeInput('10T'), { message: 'Invalid size: 10T' });
    });
  });

  describe('truncateFileName', () => {
    it('should keep short names and shorten long ones from the left', () => {
      assert.strictEqual(truncateFileName('report.txt-001'), 'report.txt-001');
      const long = 'a'.repeat(40) + '.bin-001';
      assert.strictEqual(truncateFileName(long), '...' + long.slice(-32));
    });
  });

  describe('percentOf', () => {
    it('should compute rounded percentages', () => {
      assert.strictEqual(percentOf(5, 10), 50);
      assert.strictEqual(percentOf(1, 3), 33);
      assert.strictEqual(percentOf(0, 0), 100);
    });
  });
});
