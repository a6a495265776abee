import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { CorrelationSink, EventSink } from '../../application/ports.js';
import type { StreamEntry } from '../redis/stream-codec.js';
import { STREAM_KEY, decodeEntry } from '../redis/stream-codec.js';

const GROUP_NAME = 'telemetry_persister';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

export interface ConsumerOptions {
  consumerName: string;
  /** Where decoded entries are persisted. */
  store: EventSink & CorrelationSink;
}

export interface ConsumerDeps extends ConsumerOptions {
  redis: Redis;
  log: Logger;
}

/** What persisting a read needs; only XACK touches Redis. */
export type EntryProcessorDeps = Pick<ConsumerDeps, 'store' | 'log'> & { redis: Pick<Redis, 'xack'> };

export type RawEntry = [id: string, fields: string[]];

/**
 * Ensures the consumer group exists on the stream.
 *
 * Start ID "$" = only deliver messages arriving after group creation.
 * Crash recovery goes through processPending(), which re-reads this
 * consumer's own pending entries list with cursor "0".
 *
 * Uses MKSTREAM so the stream is created if it doesn't exist yet.
 * Ignores BUSYGROUP errors (group already exists).
 */
async function ensureConsumerGroup(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', STREAM_KEY, GROUP_NAME, '$', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream: STREAM_KEY }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Main consumer loop.
 *
 * XREADGROUP with BLOCK, then for each read: decode, persist events as one
 * batch and correlations one by one, then XACK the whole read.
 * Never ACK before a successful write: on failure the entries stay in the
 * pending list and are retried on the next start.
 * Malformed entries are logged and acknowledged so they cannot block the
 * stream.
 *
 * The loop runs until `signal` is aborted (graceful shutdown).
 */
export async function startConsumer(
  redis: Redis,
  log: Logger,
  signal: AbortSignal,
  options: ConsumerOptions,
): Promise<void> {
  const deps: ConsumerDeps = { ...options, redis, log };

  await ensureConsumerGroup(redis, log);

  log.info(
    { consumer: options.consumerName, group: GROUP_NAME, stream: STREAM_KEY },
    'Consumer started',
  );

  await processPending(deps);

  while (!signal.aborted) {
    try {
      const response = await redis.xreadgroup(
        'GROUP', GROUP_NAME, options.consumerName,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', STREAM_KEY,
        '>',  // only new, undelivered messages
      );

      // null = timeout with no new messages
      if (response === null) continue;

      for (const [, entries] of readResponse(response)) {
        await processEntries(deps, entries);
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Consumer stopped');
}

/**
 * ioredis types XREADGROUP replies loosely; keep only well-formed
 * `[stream, [[id, fields], ...]]` tuples.
 */
function readResponse(response: unknown): Array<[string, RawEntry[]]> {
  if (!Array.isArray(response)) return [];
  const streams: Array<[string, RawEntry[]]> = [];
  for (const stream of response) {
    if (!Array.isArray(stream) || typeof stream[0] !== 'string' || !Array.isArray(stream[1])) continue;
    const entries: RawEntry[] = [];
    for (const entry of stream[1]) {
      if (!Array.isArray(entry) || typeof entry[0] !== 'string') continue;
      const fields: unknown = entry[1];
      const strings = Array.isArray(fields)
        ? fields.filter((f): f is string => typeof f === 'string')
        : [];
      entries.push([entry[0], strings]);
    }
    streams.push([stream[0], entries]);
  }
  return streams;
}

/**
 * Processes pending (previously delivered but unacknowledged) entries.
 * This handles recovery after a crash or restart.
 */
async function processPending(deps: ConsumerDeps): Promise<void> {
  deps.log.info('Checking for pending entries...');

  const response = await deps.redis.xreadgroup(
    'GROUP', GROUP_NAME, deps.consumerName,
    'COUNT', BATCH_SIZE,
    'STREAMS', STREAM_KEY,
    '0',  // '0' = re-read pending entries for this consumer
  );

  if (response === null) return;

  let count = 0;
  for (const [, entries] of readResponse(response)) {
    const live = entries.filter(([, fields]) => fields.length > 0); // acked entries come back empty
    await processEntries(deps, live);
    count += live.length;
  }

  if (count > 0) {
    deps.log.info({ count }, 'Recovered pending entries');
  }
}

/**
 * Persists one read of stream entries, then acknowledges them.
 * Returns the number of entries acknowledged.
 */
export async function processEntries(
  deps: EntryProcessorDeps,
  entries: readonly RawEntry[],
): Promise<number> {
  if (entries.length === 0) return 0;

  const decoded: StreamEntry[] = [];
  for (const [streamId, fields] of entries) {
    const entry = decodeEntry(fields);
    if (entry === null) {
      deps.log.warn({ streamId }, 'Malformed stream entry, skipping');
      continue;
    }
    decoded.push(entry);
  }

  const ids = entries.map(([streamId]) => streamId);

  try {
    const events = decoded.flatMap((e) => (e.kind === 'event' ? [e.event] : []));
    await deps.store.writeBatch(events);
    for (const entry of decoded) {
      if (entry.kind === 'correlation') await deps.store.insertCorrelation(entry.record);
    }

    await deps.redis.xack(STREAM_KEY, GROUP_NAME, ...ids);
    deps.log.debug({ count: ids.length, events: events.length }, 'Stream entries persisted');
    return ids.length;
  } catch (err: unknown) {
    // Do NOT ack; entries stay in the pending list for redelivery
    deps.log.error({ err, first: ids[0], count: ids.length }, 'Failed to persist stream entries');
    return 0;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
