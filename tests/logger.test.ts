import { describe, it, expect, beforeEach } from 'vitest';
import { logger } from '../src/utils/logger.js';

describe('logger', () => {
  beforeEach(() => {
    logger.clear();
  });

  it('should tag each level', () => {
    logger.info('a');
    logger.ok('b');
    logger.warn('c');
    logger.error('d');
    expect(logger.lines()).toEqual(['[INFO] a', '[OK] b', '[WARN] c', '[ERROR] d']);
  });

  it('should underline headers to the title width', () => {
    logger.header('Ads');
    expect(logger.lines()).toEqual(['', '## Ads', '─────']);
  });

  it('should align table values', () => {
    logger.table([['a', '1'], ['bbb', '2']]);
    expect(logger.lines()).toEqual(['  a    1', '  bbb  2']);
  });

  it('should empty the buffer on flush but not on toText', () => {
    logger.ok('done');
    expect(logger.toText()).toBe('[OK] done');
    expect(logger.flush()).toBe('[OK] done');
    expect(logger.lines()).toEqual([]);
  });
});
