import type { Redis } from 'ioredis';
import { z } from 'zod';
import type { ItemTouch } from '../../domain/index.js';
import { EVENT_STAGES } from '../../domain/index.js';
import type { TouchStore } from '../../application/ports.js';

const KEY_PREFIX = 'touches:item:';

/** Touch keys outlive the race window by this much before Redis expires them. */
const MIN_TTL_SECONDS = 30;

const touchSchema = z.object({
  item_id: z.number().int(),
  session_id: z.string(),
  stage: z.enum(EVENT_STAGES),
  timestamp: z.string(),
});

/**
 * Transient touch storage: one sorted set per item, scored by epoch ms.
 *
 * Entries older than the TTL are pruned on write and the key expires on
 * its own, so nothing here needs the retention purge.
 */
export class RedisTouchStore implements TouchStore {
  private readonly ttlSeconds: number;

  constructor(
    private readonly redis: Pick<Redis, 'zrangebyscore' | 'multi'>,
    windowSeconds: number,
  ) {
    this.ttlSeconds = Math.max(windowSeconds * 3, MIN_TTL_SECONDS);
  }

  async findRecentTouches(itemId: number, since: string, until: string): Promise<ItemTouch[]> {
    const members = await this.redis.zrangebyscore(
      `${KEY_PREFIX}${itemId}`,
      Date.parse(since),
      Date.parse(until),
    );

    return members.flatMap((member) => {
      try {
        const parsed = touchSchema.safeParse(JSON.parse(member));
        return parsed.success ? [parsed.data] : [];
      } catch {
        return [];
      }
    });
  }

  async recordTouch(touch: ItemTouch): Promise<void> {
    const key = `${KEY_PREFIX}${touch.item_id}`;
    const score = Date.parse(touch.timestamp);

    const results = await this.redis
      .multi()
      .zadd(key, score, JSON.stringify(touch))
      .zremrangebyscore(key, '-inf', score - this.ttlSeconds * 1000)
      .expire(key, this.ttlSeconds)
      .exec();

    const error = results?.map(([err]) => err).find((err): err is Error => err !== null);
    if (error !== undefined) throw error;
  }
}
