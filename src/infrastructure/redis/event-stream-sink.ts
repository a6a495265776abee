import type { Redis } from 'ioredis';
import type { CorrelationRecord, IndexEvent } from '../../domain/index.js';
import type { CorrelationSink, EventSink } from '../../application/ports.js';
import { STREAM_KEY, encodeEntry } from './stream-codec.js';

/**
 * Appends telemetry to the Redis stream; the worker persists it.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`). A batch goes out as
 * one pipeline, so entries keep their order.
 */
export class RedisStreamSink implements EventSink, CorrelationSink {
  constructor(private readonly redis: Pick<Redis, 'pipeline' | 'xadd'>) {}

  async writeBatch(events: readonly IndexEvent[]): Promise<void> {
    if (events.length === 0) return;

    const pipeline = this.redis.pipeline();
    for (const event of events) {
      pipeline.xadd(STREAM_KEY, '*', ...encodeEntry({ kind: 'event', event }));
    }

    const results = await pipeline.exec();
    const error = results?.map(([err]) => err).find((err): err is Error => err !== null);
    if (error !== undefined) throw error;
  }

  async insertCorrelation(record: CorrelationRecord): Promise<void> {
    await this.redis.xadd(STREAM_KEY, '*', ...encodeEntry({ kind: 'correlation', record }));
  }
}
