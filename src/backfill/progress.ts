import { logger } from '../shared/logger.js';
import type { ProgressReporter, SlotRange, SlotWindow, WindowProgress } from './types.js';

// Share of the range that lay before this window
export const progressPercent = (range: Pick<SlotRange, 'fromSlot' | 'toSlot'>, window: SlotWindow): number => {
  const totalSlots = range.toSlot - range.fromSlot;
  if (totalSlots === 0) return 0;
  return ((window.startSlot - range.fromSlot) / totalSlots) * 100;
};

export const logProgress: ProgressReporter = (progress: WindowProgress) => {
  logger.info(
    `[Backfill] blobs downloaded for ${progress.startSlot}..${progress.endSlot} [${progress.percent.toFixed(2)}%]`,
    {
      records: progress.recordsWritten,
      sidecars: progress.sidecarsWritten,
      toSlot: progress.toSlot,
    }
  );
};
