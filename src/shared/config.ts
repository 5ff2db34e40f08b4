import { z } from 'zod'
import dotenv from 'dotenv'
import { ConfigError } from './errors.js'

// Load environment variables
dotenv.config()

export const NETWORKS = ['mainnet', 'sepolia', 'holesky'] as const
export type Network = (typeof NETWORKS)[number]

// First slot of the Deneb fork, where blob sidecars start to exist
export const BLOB_ACTIVATION_SLOT: Record<Network, number> = {
  mainnet: 8626176,
  sepolia: 4243456,
  holesky: 950272,
}

export const SINK_KINDS = ['level', 'jsonl'] as const
export type SinkKind = (typeof SINK_KINDS)[number]

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

const slotSchema = z.number().int().nonnegative()

export const loggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  filePath: z.string().optional(),
  maxSizeMB: z.number().positive().optional(),
  maxFiles: z.number().int().positive().optional(),
})

const configSchema = z.object({
  // Beacon node
  beaconApi: z.object({
    url: z.string().url(),
  }),

  // Slot range and windowing
  backfill: z.object({
    network: z.enum(NETWORKS).default('mainnet'),
    fromSlot: slotSchema,
    toSlot: slotSchema.optional(),
    concurrency: z.number().int().positive().default(20),
  }),

  fetcher: z.object({
    retryCount: z.number().int().positive().default(10),
    retryDelayMs: z.number().int().nonnegative().default(5000),
  }),

  storage: z.object({
    sink: z.enum(SINK_KINDS).default('level'),
    dataDir: z.string().min(1),
  }),

  logging: loggingSchema,
})

export type Config = z.infer<typeof configSchema>
export type LoggingConfig = z.infer<typeof loggingSchema>

// Values passed on the command line; they take precedence over the environment
export type ConfigOverrides = {
  apiUrl?: string
  fromSlot?: number
  toSlot?: number
  concurrency?: number
  dataDir?: string
  sink?: string
  network?: string
  retryCount?: number
  retryDelayMs?: number
  logLevel?: string
}

const parseEnvNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined
  // NaN on garbage, which the schema rejects
  return Number(value)
}

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)

// Read when the logger is created at import time, so it never throws: an
// invalid value falls back to defaults and is rejected later by loadConfig.
export const loadLoggingConfig = (env: NodeJS.ProcessEnv = process.env): LoggingConfig => {
  const parsed = loggingSchema.safeParse({
    level: env['LOG_LEVEL'] || undefined,
    filePath: env['LOG_FILE_PATH'] || undefined,
    maxSizeMB: parseEnvNumber(env['LOG_MAX_SIZE_MB']),
    maxFiles: parseEnvNumber(env['LOG_MAX_FILES']),
  })
  return parsed.success ? parsed.data : { level: 'info' }
}

export const loadConfig = (overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): Config => {
  const rawConfig = {
    beaconApi: {
      url: overrides.apiUrl ?? env['BEACON_API_URL'],
    },
    backfill: {
      network: overrides.network ?? env['NETWORK'],
      fromSlot: overrides.fromSlot ?? parseEnvNumber(env['FROM_SLOT']),
      toSlot: overrides.toSlot ?? parseEnvNumber(env['TO_SLOT']),
      concurrency: overrides.concurrency ?? parseEnvNumber(env['CONCURRENCY']),
    },
    fetcher: {
      retryCount: overrides.retryCount ?? parseEnvNumber(env['FETCH_RETRY_COUNT']),
      retryDelayMs: overrides.retryDelayMs ?? parseEnvNumber(env['FETCH_RETRY_DELAY_MS']),
    },
    storage: {
      sink: overrides.sink ?? env['SINK'],
      dataDir: overrides.dataDir ?? env['DATA_DIR'],
    },
    logging: {
      level: overrides.logLevel ?? (env['LOG_LEVEL'] || undefined),
      filePath: env['LOG_FILE_PATH'] || undefined,
      maxSizeMB: parseEnvNumber(env['LOG_MAX_SIZE_MB']),
      maxFiles: parseEnvNumber(env['LOG_MAX_FILES']),
    },
  }

  const parsed = configSchema.safeParse(rawConfig)
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error))
  }
  return parsed.data
}
