import fs from 'node:fs/promises';
import path from 'node:path';
import type { SlotWriteRecord } from '../backfill/types.js';
import { SinkCommitError } from '../shared/errors.js';
import { blockRootToHex } from '../shared/hex.js';
import { logger } from '../shared/logger.js';
import type { PersistenceSink } from './types.js';

export const JSONL_FILE_NAME = 'blobs-data.jsonl';

export const serializeRecord = (record: SlotWriteRecord): string =>
  JSON.stringify({
    slot: record.slot,
    root: blockRootToHex(record.root),
    data: record.sidecars,
  });

/**
 * Appends one line per slot to a growing log. Lines already written are never
 * touched; a crash during an append can leave the last line truncated.
 */
export const createJsonlSink = async (filePath: string): Promise<PersistenceSink> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  logger.info(`[Sink] Appending records to ${filePath}`);

  const commit = async (records: SlotWriteRecord[]): Promise<void> => {
    if (records.length === 0) return;
    const lines = records.map((record) => `${serializeRecord(record)}\n`).join('');
    try {
      await fs.appendFile(filePath, lines, 'utf8');
    } catch (error) {
      throw new SinkCommitError('jsonl', records[0]?.slot, error);
    }
  };

  return {
    kind: 'jsonl',
    commit,
    close: async () => {},
  };
};
