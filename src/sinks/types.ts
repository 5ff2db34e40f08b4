import type { SlotWriteRecord } from '../backfill/types.js';
import type { SinkKind } from '../shared/config.js';

/** Receives one window's records at a time, in ascending slot order. */
export type PersistenceSink = {
  kind: SinkKind;
  commit: (records: SlotWriteRecord[]) => Promise<void>;
  close: () => Promise<void>;
};
