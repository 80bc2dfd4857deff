import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_CONFIG, getEnvBoolean, getEnvNumber, readConfig } from '../config.js';

describe('Configuration', () => {
  it('should fall back to defaults for an empty environment', () => {
    assert.deepStrictEqual(readConfig({}), {
      chunkLimit: 104857600,
      outputDir: '.',
      inputDir: '.',
      compress: false,
      strict: false,
    });
    assert.strictEqual(DEFAULT_CONFIG.chunkLimit, 100 * 1024 * 1024);
  });

  it('should read every variable from the environment', () => {
    const config = readConfig({
      FILE_PARTS_CHUNK_LIMIT: '4096',
      FILE_PARTS_OUTPUT_DIR: '/srv/out',
      FILE_PARTS_INPUT_DIR: '/srv/in',
      FILE_PARTS_COMPRESS: 'true',
      FILE_PARTS_STRICT: 'TRUE',
    });

    assert.deepStrictEqual(config, {
      chunkLimit: 4096,
      outputDir: '/srv/out',
      inputDir: '/srv/in',
      compress: true,
      strict: true,
    });
  });

  it('should ignore empty and unparseable values', () => {
    assert.strictEqual(getEnvNumber('LIMIT', 10, { LIMIT: 'lots' }), 10);
    assert.strictEqual(getEnvNumber('LIMIT', 10, { LIMIT: '' }), 10);
    assert.strictEqual(getEnvBoolean('FLAG', true, { FLAG: '' }), true);
    assert.strictEqual(getEnvBoolean('FLAG', true, { FLAG: 'yes' }), false);
  });
});
