#!/usr/bin/env node
import path from 'node:path'
import { parseCliArgs } from './cli/options.js'
import { loadConfig, BLOB_ACTIVATION_SLOT, type Config } from './shared/config.js'
import { logger, setLogLevel } from './shared/logger.js'
import { BackfillError } from './shared/errors.js'
import { createBeaconClient } from './beacon-client/client.js'
import { planRange } from './backfill/range-planner.js'
import { runBackfill } from './backfill/scheduler.js'
import { openLevelStore } from './database/level.js'
import { createJsonlSink, JSONL_FILE_NAME } from './sinks/jsonl-sink.js'
import { createLevelSink, LEVEL_DIR_NAME } from './sinks/level-sink.js'
import type { PersistenceSink } from './sinks/types.js'
import { useSink } from './sinks/use-sink.js'

const openSink = async (config: Config): Promise<PersistenceSink> => {
  const { sink, dataDir } = config.storage
  if (sink === 'jsonl') {
    return createJsonlSink(path.join(dataDir, JSONL_FILE_NAME))
  }
  return createLevelSink(await openLevelStore(path.join(dataDir, LEVEL_DIR_NAME)))
}

const main = async () => {
  const config = loadConfig(parseCliArgs(process.argv.slice(2)))
  setLogLevel(config.logging.level)
  logger.info(`Starting blob sidecar backfill from ${config.beaconApi.url}`)

  const client = createBeaconClient({
    baseUrl: config.beaconApi.url,
    retryCount: config.fetcher.retryCount,
    retryDelayMs: config.fetcher.retryDelayMs,
  })

  const range = await planRange(
    {
      fromSlot: config.backfill.fromSlot,
      toSlot: config.backfill.toSlot,
      activationSlot: BLOB_ACTIVATION_SLOT[config.backfill.network],
      concurrency: config.backfill.concurrency,
    },
    client.getHeadSlot
  )

  await useSink(await openSink(config), (sink) => runBackfill(range, { client, sink }))
}

main().catch((error: unknown) => {
  if (error instanceof BackfillError) {
    const at = error.slot === undefined ? '' : ` at slot ${error.slot}`
    logger.error(`Backfill failed with ${error.kind}${at}: ${error.message}`, { cause: error.cause })
  } else {
    logger.error('Unhandled error at main execution level:', error)
  }
  process.exit(1)
})
