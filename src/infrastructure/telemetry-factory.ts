import type { Logger } from 'pino';
import type { IndexingObserver } from '../domain/index.js';
import { StoreUnavailableError } from '../domain/index.js';
import type { CorrelationSink, EventSink, TouchStore } from '../application/ports.js';
import type { IngestionSession, IngestionSessionOptions } from '../application/ingestion-session.js';
import { startIngestionSession } from '../application/ingestion-session.js';
import { EventBuffer } from '../application/event-buffer.js';
import { RaceDetector } from '../application/race-detector.js';
import { IndexingTelemetry, noopObserver } from '../application/indexing-telemetry.js';
import type { Config } from './config.js';
import { createDbClient, PostgresEventStore } from './db/index.js';
import { InMemoryEventStore } from './memory/in-memory-event-store.js';
import { createRedisClient } from './redis/client.js';
import { RedisStreamSink } from './redis/event-stream-sink.js';
import { RedisTouchStore } from './redis/touch-store.js';

export type TelemetryConfig = Pick<
  Config,
  'DATABASE_URL' | 'REDIS_URL' | 'TELEMETRY_SINK' | 'TELEMETRY_BUFFER_SIZE' | 'RACE_WINDOW_SECONDS' | 'RACE_TOUCH_STORE'
>;

export interface Telemetry {
  observer: IndexingObserver;
  session: IngestionSession;
  /** False when the store was unreachable and the observer is a no-op. */
  enabled: boolean;
  /** Flushes what is still buffered and releases connections. */
  close(): Promise<void>;
}

interface Wiring {
  sink: EventSink;
  correlations: CorrelationSink;
  touches: TouchStore;
  close: Array<() => Promise<unknown>>;
}

async function connectStores(config: TelemetryConfig, memory?: InMemoryEventStore): Promise<Wiring> {
  const close: Array<() => Promise<unknown>> = [];

  try {
    let postgres: PostgresEventStore | undefined;
    const usePostgres = config.TELEMETRY_SINK === 'postgres'
      || (config.TELEMETRY_SINK === 'stream' && config.RACE_TOUCH_STORE === 'postgres');
    if (usePostgres) {
      const { sql, db } = createDbClient(config.DATABASE_URL);
      close.push(() => sql.end());
      postgres = new PostgresEventStore(db);
      await postgres.ping();
    }

    let redis: ReturnType<typeof createRedisClient> | undefined;
    if (config.TELEMETRY_SINK === 'stream' || config.RACE_TOUCH_STORE === 'redis') {
      const client = createRedisClient(config.REDIS_URL);
      redis = client;
      close.push(() => client.quit());
      await client.connect();
    }

    const touches = config.RACE_TOUCH_STORE === 'redis' && redis !== undefined
      ? new RedisTouchStore(redis, config.RACE_WINDOW_SECONDS)
      : postgres;

    if (config.TELEMETRY_SINK === 'stream' && redis !== undefined) {
      const stream = new RedisStreamSink(redis);
      return { sink: stream, correlations: stream, touches: touches ?? new InMemoryEventStore(), close };
    }
    if (config.TELEMETRY_SINK === 'postgres' && postgres !== undefined) {
      return { sink: postgres, correlations: postgres, touches: touches ?? postgres, close };
    }

    const store = memory ?? new InMemoryEventStore();
    return { sink: store, correlations: store, touches: touches ?? store, close };
  } catch (err: unknown) {
    await Promise.allSettled(close.map((fn) => fn()));
    throw err;
  }
}

export interface CreateTelemetryOptions extends IngestionSessionOptions {
  /** Store used by the `memory` sink; a fresh one when omitted. */
  memoryStore?: InMemoryEventStore;
}

/**
 * Builds the observer for one indexing session from configuration.
 *
 * Connects to the configured stores up front. If that fails, the failure
 * is logged as a StoreUnavailableError and a no-op observer is returned
 * so the pipeline runs without telemetry.
 */
export async function createTelemetry(
  config: TelemetryConfig,
  log: Logger,
  options: CreateTelemetryOptions = {},
): Promise<Telemetry> {
  const session = startIngestionSession(options);

  let wiring: Wiring;
  try {
    wiring = await connectStores(config, options.memoryStore);
  } catch (cause: unknown) {
    const err = new StoreUnavailableError(
      cause instanceof Error ? cause.message : String(cause),
      { cause },
    );
    log.error({ err, sink: config.TELEMETRY_SINK }, 'Telemetry disabled');
    return { observer: noopObserver, session, enabled: false, close: async () => {} };
  }

  const detector = new RaceDetector(wiring.touches, wiring.correlations, log, {
    windowSeconds: config.RACE_WINDOW_SECONDS,
  });
  const buffer = new EventBuffer({
    sink: wiring.sink,
    session,
    log,
    detector,
    threshold: config.TELEMETRY_BUFFER_SIZE,
  });

  log.info(
    { session_id: session.session_id, sink: config.TELEMETRY_SINK, threshold: buffer.threshold },
    'Telemetry session started',
  );

  return {
    observer: new IndexingTelemetry(buffer, log),
    session,
    enabled: true,
    async close() {
      await buffer.flush();
      const results = await Promise.allSettled(wiring.close.map((fn) => fn()));
      for (const result of results) {
        if (result.status === 'rejected') {
          log.warn({ err: result.reason }, 'Failed to close telemetry connection');
        }
      }
    },
  };
}
