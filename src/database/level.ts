import { Level } from 'level'
import fs from 'node:fs'
import { logger } from '../shared/logger.js'
import type { KeyValueStore, PutOperation } from './types.js'

const isNotFound = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'LEVEL_NOT_FOUND'

export const openLevelStore = async (location: string): Promise<KeyValueStore> => {
  fs.mkdirSync(location, { recursive: true })
  const db = new Level<Uint8Array, Uint8Array>(location, { keyEncoding: 'binary', valueEncoding: 'binary' })
  await db.open()
  logger.info(`[DB] LevelDB store opened at ${location}`)

  const get = async (key: Uint8Array): Promise<Uint8Array | null> => {
    try {
      return await db.get(key)
    } catch (e) {
      if (isNotFound(e)) {
        return null
      }
      throw e
    }
  }

  const batch = (ops: PutOperation[]): Promise<void> =>
    db.batch(ops.map((op) => ({ type: 'put' as const, key: op.key, value: op.value })))

  const close = async () => {
    await db.close()
    logger.info(`[DB] LevelDB store at ${location} closed.`)
  }

  return { get, batch, close }
}
