import { describe, it, expect, vi } from 'vitest';
import { createLevelLogger, silentLogger } from '../../src/types/logger.js';

function mockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createLevelLogger', () => {
  it('drops messages below the minimum level', () => {
    const base = mockLogger();
    const logger = createLevelLogger(base, 'warn');

    logger.debug('hidden');
    logger.info({ id: 1 }, 'hidden');

    expect(base.debug).not.toHaveBeenCalled();
    expect(base.info).not.toHaveBeenCalled();
  });

  it('forwards messages at or above the minimum level', () => {
    const base = mockLogger();
    const logger = createLevelLogger(base, 'warn');

    logger.warn('careful');
    logger.error({ store: 'notes' }, 'failed', 42);

    expect(base.warn).toHaveBeenCalledWith('careful');
    expect(base.error).toHaveBeenCalledWith({ store: 'notes' }, 'failed', 42);
  });

  it('forwards everything at debug', () => {
    const base = mockLogger();
    createLevelLogger(base, 'debug').debug('trace %s', 'x');

    expect(base.debug).toHaveBeenCalledWith('trace %s', 'x');
  });
});

describe('silentLogger', () => {
  it('accepts every call', () => {
    expect(() => {
      silentLogger.debug('x');
      silentLogger.error({ a: 1 }, 'y');
    }).not.toThrow();
  });
});
