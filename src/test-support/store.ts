import { z } from 'zod';
import { blobSidecarSchema, type SidecarRecord } from '../beacon-client/types.js';
import { blobSidecarsKey, slotKey } from '../database/schema.js';
import type { KeyValueStore } from '../database/types.js';
import { blockRootToHex } from '../shared/hex.js';

// Read-back helpers for sink tests; the backfill itself only writes.

export const readSlotRoot = async (store: KeyValueStore, slot: number): Promise<string | null> => {
  const value = await store.get(slotKey(slot));
  return value === null ? null : blockRootToHex(value);
};

export const readSidecars = async (store: KeyValueStore, root: Uint8Array): Promise<SidecarRecord[] | null> => {
  const value = await store.get(blobSidecarsKey(root));
  if (value === null) return null;
  return z.array(blobSidecarSchema).parse(JSON.parse(Buffer.from(value).toString('utf8')));
};
