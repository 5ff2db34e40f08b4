export type PutOperation = {
  type: 'put'
  key: Uint8Array
  value: Uint8Array
}

/** Binary key/value store whose batches apply all-or-nothing. */
export type KeyValueStore = {
  get: (key: Uint8Array) => Promise<Uint8Array | null>
  batch: (ops: PutOperation[]) => Promise<void>
  close: () => Promise<void>
}
