import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { createLogger, setDebugMode } from '../utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    setDebugMode(false);
    mock.restoreAll();
  });

  it('should prefix every line with the scope', () => {
    const log = mock.method(console, 'log', () => {});
    const warn = mock.method(console, 'warn', () => {});
    const error = mock.method(console, 'error', () => {});
    const logger = createLogger('restore');

    logger.info('Restoring', 3);
    logger.warn('Warning: Checksum mismatch');
    logger.error('failed');

    assert.deepStrictEqual(log.mock.calls[0].arguments, ['[restore]', 'Restoring', 3]);
    assert.deepStrictEqual(warn.mock.calls[0].arguments, [
      '[restore]',
      'Warning: Checksum mismatch',
    ]);
    assert.deepStrictEqual(error.mock.calls[0].arguments, ['[restore]', 'failed']);
  });

  it('should only print debug lines in debug mode', () => {
    const log = mock.method(console, 'log', () => {});
    const logger = createLogger('split');

    logger.debug('hidden');
    assert.strictEqual(log.mock.callCount(), 0);

    setDebugMode(true);
    logger.debug('a.bin-001: 4 bytes read');
    assert.strictEqual(log.mock.callCount(), 1);
    assert.deepStrictEqual(log.mock.calls[0].arguments, ['[split]', 'a.bin-001: 4 bytes read']);
  });
});
