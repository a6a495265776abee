export { loadConfig } from './config.js';
export type { Config } from './config.js';
export { createDbClient, ensureTables, PostgresEventStore, dbPlugin } from './db/index.js';
export type { Database } from './db/index.js';
export { InMemoryEventStore, storePlugin } from './memory/index.js';
export { createRedisClient, RedisStreamSink, RedisTouchStore } from './redis/index.js';
export { startConsumer } from './worker/index.js';
export { createTelemetry } from './telemetry-factory.js';
export type { Telemetry, TelemetryConfig, CreateTelemetryOptions } from './telemetry-factory.js';
