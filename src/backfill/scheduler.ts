import type { BeaconClient } from '../beacon-client/types.js';
import type { PersistenceSink } from '../sinks/types.js';
import { logger } from '../shared/logger.js';
import { toError } from '../shared/errors.js';
import { correlateWindow } from './correlator.js';
import { partitionWindows } from './range-planner.js';
import { logProgress, progressPercent } from './progress.js';
import type { BackfillSummary, ProgressReporter, SlotRange, SlotWindow, SlotWriteRecord } from './types.js';

export type BackfillDeps = {
  client: Pick<BeaconClient, 'getBlobSidecars' | 'getBlockRoot'>;
  sink: PersistenceSink;
  reportProgress?: ProgressReporter;
};

// Every task has settled by now; the first failure in slot order wins
const unwrapSettled = <T>(results: PromiseSettledResult<T>[]): T[] =>
  results.map((result) => {
    if (result.status === 'rejected') {
      throw toError(result.reason);
    }
    return result.value;
  });

const slotsOf = (window: SlotWindow): number[] =>
  Array.from({ length: window.endSlot - window.startSlot + 1 }, (_, offset) => window.startSlot + offset);

export const fetchWindow = async (
  client: BackfillDeps['client'],
  window: SlotWindow
): Promise<SlotWriteRecord[]> => {
  const slots = slotsOf(window);
  const [sidecarResults, rootResults] = await Promise.all([
    Promise.allSettled(slots.map((slot) => client.getBlobSidecars(slot))),
    Promise.allSettled(slots.map((slot) => client.getBlockRoot(slot))),
  ]);
  const sidecars = unwrapSettled(sidecarResults);
  const roots = unwrapSettled(rootResults);
  return correlateWindow(window, roots, sidecars);
};

/**
 * Walks the range window by window. A window is fetched in full, committed,
 * then reported before the next one starts; any failure stops the run with
 * earlier windows already committed.
 */
export const runBackfill = async (range: SlotRange, deps: BackfillDeps): Promise<BackfillSummary> => {
  const reportProgress = deps.reportProgress ?? logProgress;
  const summary: BackfillSummary = { windows: 0, slots: 0, sidecars: 0 };

  logger.info(
    `[Backfill] Syncing slots ${range.fromSlot}..${range.toSlot} in windows of ${range.windowSize} into ${deps.sink.kind} sink`
  );

  for (const window of partitionWindows(range)) {
    logger.debug(`[Backfill] Fetching window ${window.startSlot}..${window.endSlot}`);
    const records = await fetchWindow(deps.client, window);
    const sidecarCount = records.reduce((count, record) => count + record.sidecars.length, 0);

    logger.debug(`[Backfill] Writing ${records.length} records (${sidecarCount} sidecars) to ${deps.sink.kind} sink`);
    await deps.sink.commit(records);

    summary.windows += 1;
    summary.slots += records.length;
    summary.sidecars += sidecarCount;

    reportProgress({
      ...window,
      fromSlot: range.fromSlot,
      toSlot: range.toSlot,
      percent: progressPercent(range, window),
      recordsWritten: records.length,
      sidecarsWritten: sidecarCount,
    });
  }

  logger.info(`[Backfill] Completed ${summary.slots} slots in ${summary.windows} windows, ${summary.sidecars} sidecars written`);
  return summary;
};
