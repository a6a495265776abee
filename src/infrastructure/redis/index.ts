export { createRedisClient } from './client.js';
export { RedisStreamSink } from './event-stream-sink.js';
export { RedisTouchStore } from './touch-store.js';
export { STREAM_KEY, encodeEntry, decodeEntry } from './stream-codec.js';
export type { StreamEntry } from './stream-codec.js';
