import { Redis } from 'ioredis';

/** ioredis connection configured for stream use; call `connect()` before first use. */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: null,   // required for blocking stream reads
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
