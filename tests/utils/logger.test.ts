import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { logger } from '../../src/utils/logger.js';
import { LogLevel } from '../../src/types/index.js';

function capture(): string[] {
  const lines: string[] = [];
  mock.method(console, 'error', (line: string) => {
    lines.push(line);
  });
  return lines;
}

afterEach(() => {
  mock.restoreAll();
  logger.setLevel(LogLevel.ERROR);
});

describe('logger', () => {
  it('drops messages below the configured level', () => {
    const lines = capture();
    logger.setLevel(LogLevel.WARN);
    logger.debug('resolving');
    logger.info('loaded');
    logger.warn('degraded version');

    assert.equal(lines.length, 1);
    assert.ok(lines[0].endsWith('[WARN]  degraded version'));
  });

  it('writes collections in the metadata as JSON', () => {
    const lines = capture();
    logger.error('failed', new Map([['numpy', 1]]));

    assert.equal(lines.length, 1);
    assert.ok(lines[0].endsWith('[ERROR] failed\n{\n  "numpy": 1\n}'));
  });
});
