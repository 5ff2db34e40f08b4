import { logger } from '../shared/logger.js';
import type { PersistenceSink } from './types.js';

/**
 * Runs `fn` against the sink and closes it afterwards. A failing close is
 * logged and never replaces the error `fn` raised.
 */
export const useSink = async <T>(sink: PersistenceSink, fn: (sink: PersistenceSink) => Promise<T>): Promise<T> => {
  let result: T;
  try {
    result = await fn(sink);
  } catch (error) {
    await sink.close().catch((closeError: unknown) => {
      logger.error(`[Sink] Failed to close ${sink.kind} sink after an earlier failure:`, closeError);
    });
    throw error;
  }
  await sink.close();
  return result;
};
