import { describe, it, expect, afterEach } from 'vitest';
import { logger, createLogger, createChildLogger, setLogLevel, withTiming } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('applies a new level to service loggers created earlier', () => {
    const serviceLogger = createLogger({ service: 'level-test' });

    setLogLevel('debug');

    expect(logger.level).toBe('debug');
    expect(serviceLogger.level).toBe('debug');
  });

  it('binds context on child loggers', () => {
    const child = createChildLogger(createLogger({ service: 'batch' }), { batchId: 'batch-1' });

    expect(child.bindings()).toMatchObject({ service: 'batch', batchId: 'batch-1' });
  });

  describe('withTiming', () => {
    it('returns the result of the step', async () => {
      const log = createLogger({ service: 'timing-test' });

      await expect(withTiming(log, 'fetch', async () => 42)).resolves.toBe(42);
    });

    it('rethrows a failing step', async () => {
      const log = createLogger({ service: 'timing-test' });

      await expect(
        withTiming(log, 'fetch', async () => {
          throw new Error('mailbox offline');
        })
      ).rejects.toThrow('mailbox offline');
    });
  });
});
