import { Command, InvalidArgumentError, Option } from 'commander';
import { LOG_LEVELS, NETWORKS, SINK_KINDS, type ConfigOverrides } from '../shared/config.js';

const parseNonNegativeInt = (value: string): number => {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return Number(value);
};

const parsePositiveInt = (value: string): number => {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be greater than zero.');
  }
  return parsed;
};

export const buildProgram = (): Command =>
  new Command()
    .name('blob-backfill')
    .description('Backfill blob sidecars and block roots for a slot range from a beacon node API')
    .option('--api-url <url>', 'beacon node HTTP API base URL (env BEACON_API_URL)')
    .option('-f, --from-slot <slot>', 'first slot to sync (env FROM_SLOT)', parseNonNegativeInt)
    .option('-t, --to-slot <slot>', 'last slot to sync, defaults to the head slot (env TO_SLOT)', parseNonNegativeInt)
    .option('-c, --concurrency <n>', 'slots fetched per window (env CONCURRENCY, default 20)', parsePositiveInt)
    .option('-d, --data-dir <dir>', 'directory holding the output store (env DATA_DIR)')
    .addOption(new Option('--sink <kind>', 'storage backend (env SINK, default level)').choices(SINK_KINDS))
    .addOption(new Option('--network <name>', 'network, selects the blob activation slot (env NETWORK)').choices(NETWORKS))
    .option('--retry-count <n>', 'attempts per request (env FETCH_RETRY_COUNT, default 10)', parsePositiveInt)
    .option('--retry-delay-ms <ms>', 'delay between attempts (env FETCH_RETRY_DELAY_MS, default 5000)', parseNonNegativeInt)
    .addOption(new Option('--log-level <level>', 'log level (env LOG_LEVEL)').choices(LOG_LEVELS));

/** Parses user arguments (no node/script prefix) into config overrides. */
export const parseCliArgs = (args: string[], program: Command = buildProgram()): ConfigOverrides => {
  program.parse(args, { from: 'user' });
  return program.opts<ConfigOverrides>();
};
