import { logger } from '../shared/logger.js';
import { InvalidRangeError } from '../shared/errors.js';
import type { SlotRange, SlotWindow } from './types.js';

export type RangeRequest = {
  fromSlot: number;
  toSlot?: number;
  activationSlot: number;
  concurrency: number;
};

export const clampStartSlot = (fromSlot: number, activationSlot: number): number => {
  if (fromSlot < activationSlot) {
    logger.warn(`[Backfill] Using ${activationSlot} instead of ${fromSlot} since blobs did not exist before that slot`);
    return activationSlot;
  }
  return fromSlot;
};

export const resolveEndSlot = async (
  toSlot: number | undefined,
  getHeadSlot: () => Promise<number>
): Promise<number> => {
  if (toSlot !== undefined) {
    return toSlot;
  }
  const headSlot = await getHeadSlot();
  logger.info(`[Backfill] Head slot: ${headSlot}`);
  return headSlot;
};

export const planRange = async (
  request: RangeRequest,
  getHeadSlot: () => Promise<number>
): Promise<SlotRange> => {
  const fromSlot = clampStartSlot(request.fromSlot, request.activationSlot);
  const toSlot = await resolveEndSlot(request.toSlot, getHeadSlot);
  if (toSlot < fromSlot) {
    throw new InvalidRangeError(fromSlot, toSlot);
  }
  return { fromSlot, toSlot, windowSize: request.concurrency };
};

/** Consecutive windows covering the range; the last one stops at `toSlot`. */
export function* partitionWindows(range: SlotRange): Generator<SlotWindow> {
  for (let startSlot = range.fromSlot; startSlot <= range.toSlot; startSlot += range.windowSize) {
    yield { startSlot, endSlot: Math.min(startSlot + range.windowSize - 1, range.toSlot) };
  }
}
