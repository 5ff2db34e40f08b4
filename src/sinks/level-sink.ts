import type { SlotWriteRecord } from '../backfill/types.js';
import { blobSidecarsKey, slotKey } from '../database/schema.js';
import type { KeyValueStore, PutOperation } from '../database/types.js';
import { SinkCommitError } from '../shared/errors.js';
import { isEmptyBlockRoot } from '../shared/hex.js';
import { logger } from '../shared/logger.js';
import type { PersistenceSink } from './types.js';

export const LEVEL_DIR_NAME = 'blobs_db';

const encodeJson = (value: unknown): Buffer => Buffer.from(JSON.stringify(value), 'utf8');

/**
 * Slot index entry for every record; the sidecar list under the root for
 * slots that have a header.
 */
export const recordToStoreOps = (record: SlotWriteRecord): PutOperation[] => {
  const indexOp: PutOperation = { type: 'put', key: slotKey(record.slot), value: record.root };
  if (isEmptyBlockRoot(record.root)) {
    if (record.sidecars.length > 0) {
      throw new Error(`slot ${record.slot} has ${record.sidecars.length} sidecars but no block root to key them by`);
    }
    return [indexOp];
  }
  return [
    indexOp,
    { type: 'put', key: blobSidecarsKey(record.root), value: encodeJson(record.sidecars) },
  ];
};

export const createLevelSink = (store: KeyValueStore): PersistenceSink => {
  const commit = async (records: SlotWriteRecord[]): Promise<void> => {
    try {
      const ops = records.flatMap(recordToStoreOps);
      await store.batch(ops);
      logger.debug(`[Sink] Committed ${ops.length} store operations for ${records.length} slots`);
    } catch (error) {
      throw new SinkCommitError('level', records[0]?.slot, error);
    }
  };

  return {
    kind: 'level',
    commit,
    close: () => store.close(),
  };
};
