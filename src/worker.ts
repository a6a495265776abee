import pino from 'pino';
import { loadConfig } from './infrastructure/config.js';
import { createDbClient, ensureTables, PostgresEventStore } from './infrastructure/db/index.js';
import { createRedisClient } from './infrastructure/redis/index.js';
import { startConsumer } from './infrastructure/worker/index.js';
import { purgeExpired } from './application/retention.js';

/**
 * Standalone worker process.
 *
 * - Consumes telemetry from the Redis stream and persists it to PostgreSQL.
 * - Purges everything older than RETENTION_DAYS, at start and then hourly.
 *
 * Runs independently of the HTTP server; scale by launching more
 * instances with different WORKER_ID values.
 */
const RETENTION_INTERVAL_MS = 60 * 60 * 1000;

const config = loadConfig();
const log = pino({ level: config.LOG_LEVEL });

const redis = createRedisClient(config.REDIS_URL);
const { sql, db } = createDbClient(config.DATABASE_URL);
const store = new PostgresEventStore(db);

// Abort controller for graceful shutdown
const ac = new AbortController();
let retentionTimer: NodeJS.Timeout | undefined;

function runRetention(): void {
  purgeExpired(store, log, config.RETENTION_DAYS).catch((err: unknown) => {
    log.error({ err }, 'Retention purge failed');
  });
}

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  await ensureTables(sql);
  log.info('Database ready (index_events + item_touches + correlations tables)');

  runRetention();
  retentionTimer = setInterval(runRetention, RETENTION_INTERVAL_MS);

  await startConsumer(redis, log, ac.signal, {
    consumerName: config.WORKER_ID,
    store,
  });
}

async function closeConnections(): Promise<void> {
  const results = await Promise.allSettled([redis.quit(), sql.end()]);
  for (const result of results) {
    if (result.status === 'rejected') {
      log.warn({ err: result.reason }, 'Failed to close connection');
    }
  }
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();
  clearInterval(retentionTimer);

  // Give the blocking read a moment to return, then force exit
  setTimeout(() => {
    void closeConnections().then(() => process.exit(0));
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
