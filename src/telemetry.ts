/**
 * Library entry for indexing pipelines.
 *
 * ```ts
 * const telemetry = await createTelemetry(loadConfig(), pino());
 * const indexer = new Indexer({ observer: telemetry.observer });
 * ```
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
