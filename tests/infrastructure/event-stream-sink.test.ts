import { describe, it, expect, vi } from 'vitest';
import { RedisStreamSink } from '../../src/infrastructure/redis/event-stream-sink.js';
import { STREAM_KEY } from '../../src/infrastructure/redis/stream-codec.js';
import type { CorrelationRecord } from '../../src/domain/index.js';
import { at, makeEvent, uuid } from '../helpers.js';

/** ioredis stand-in: XADD directly or through a pipeline. */
function fakeRedis(execResult: [Error | null, unknown][] = []) {
  const pipeline = {
    xadd: vi.fn(),
    exec: vi.fn().mockResolvedValue(execResult),
  };
  const redis = {
    pipeline: vi.fn().mockReturnValue(pipeline),
    xadd: vi.fn().mockResolvedValue('1-0'),
  };
  return { redis, pipeline };
}

describe('RedisStreamSink.writeBatch', () => {
  it('appends each event to the stream in one pipeline', async () => {
    const first = makeEvent({ item_id: 1 });
    const second = makeEvent({ item_id: 2 });
    const { redis, pipeline } = fakeRedis([[null, '1-0'], [null, '1-1']]);

    await new RedisStreamSink(redis).writeBatch([first, second]);

    expect(redis.pipeline).toHaveBeenCalledTimes(1);
    expect(pipeline.xadd).toHaveBeenNthCalledWith(1, STREAM_KEY, '*', 'kind', 'event', 'data', JSON.stringify(first));
    expect(pipeline.xadd).toHaveBeenNthCalledWith(2, STREAM_KEY, '*', 'kind', 'event', 'data', JSON.stringify(second));
  });

  it('rethrows the first error reported by the pipeline', async () => {
    const { redis } = fakeRedis([[null, '1-0'], [new Error('OOM command not allowed'), null]]);

    await expect(
      new RedisStreamSink(redis).writeBatch([makeEvent(), makeEvent()]),
    ).rejects.toThrow('OOM command not allowed');
  });

  it('sends nothing for an empty batch', async () => {
    const { redis } = fakeRedis();

    await new RedisStreamSink(redis).writeBatch([]);

    expect(redis.pipeline).not.toHaveBeenCalled();
  });
});

describe('RedisStreamSink.insertCorrelation', () => {
  it('appends the record as a correlation entry', async () => {
    const record: CorrelationRecord = {
      event_id: uuid(1),
      item_id: 42,
      stage: 'retrieval',
      session_id: 'B',
      sessions: ['A', 'B'],
      stages: ['retrieval'],
      first_seen: at(0),
      last_seen: at(3),
      occurrence_count: 2,
      gap_ms: 3000,
      detected_at: at(3),
    };
    const { redis } = fakeRedis();

    await new RedisStreamSink(redis).insertCorrelation(record);

    expect(redis.xadd).toHaveBeenCalledWith(STREAM_KEY, '*', 'kind', 'correlation', 'data', JSON.stringify(record));
  });
});
