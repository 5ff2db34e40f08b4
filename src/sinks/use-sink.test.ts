import { describe, expect, it, vi } from 'vitest';
import { useSink } from './use-sink.js';
import type { PersistenceSink } from './types.js';
import { RetryExhaustedError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const makeSink = (close: () => Promise<void>): PersistenceSink => ({
  kind: 'level',
  commit: async () => {},
  close: vi.fn(close),
});

describe('useSink', () => {
  it('closes the sink and returns the result', async () => {
    const sink = makeSink(async () => {});

    await expect(useSink(sink, async () => 42)).resolves.toBe(42);
    expect(sink.close).toHaveBeenCalledTimes(1);
  });

  it('rethrows the run failure when closing also fails', async () => {
    const logError = vi.spyOn(logger, 'error').mockImplementation(() => logger);
    const closeFailure = new Error('LOCK held');
    const sink = makeSink(async () => {
      throw closeFailure;
    });
    const runFailure = new RetryExhaustedError(10, 17);

    await expect(
      useSink(sink, async () => {
        throw runFailure;
      })
    ).rejects.toBe(runFailure);
    expect(sink.close).toHaveBeenCalledTimes(1);
    expect(logError).toHaveBeenCalledWith('[Sink] Failed to close level sink after an earlier failure:', closeFailure);
    logError.mockRestore();
  });

  it('reports a close failure after a successful run', async () => {
    const closeFailure = new Error('LOCK held');
    const sink = makeSink(async () => {
      throw closeFailure;
    });

    await expect(useSink(sink, async () => 'done')).rejects.toBe(closeFailure);
  });
});
