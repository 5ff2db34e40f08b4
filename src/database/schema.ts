import { BYTES_PER_ROOT } from '../shared/hex.js'

// Buckets are separate database namespaces
export enum Bucket {
  blobSidecars = 0, // Root -> JSON list of sidecars
  index_slotRoot = 1, // Slot -> Root (empty when the slot has no header)
}

const SLOT_BYTES = 8

/** Bucket byte followed by the slot as big-endian uint64, so slots iterate in order. */
export const slotKey = (slot: number): Buffer => {
  const key = Buffer.alloc(1 + SLOT_BYTES)
  key.writeUInt8(Bucket.index_slotRoot, 0)
  key.writeBigUInt64BE(BigInt(slot), 1)
  return key
}

export const blobSidecarsKey = (root: Uint8Array): Buffer => {
  if (root.length !== BYTES_PER_ROOT) {
    throw new Error(`block root must be ${BYTES_PER_ROOT} bytes, got ${root.length}`)
  }
  const key = Buffer.alloc(1 + BYTES_PER_ROOT)
  key.writeUInt8(Bucket.blobSidecars, 0)
  key.set(root, 1)
  return key
}
