import type { Logger } from 'pino';
import type { PurgeResult, RetentionStore } from './ports.js';

export const DEFAULT_RETENTION_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

/** Deletes events, touches and correlation records older than the TTL. */
export async function purgeExpired(
  store: RetentionStore,
  log: Logger,
  retentionDays: number = DEFAULT_RETENTION_DAYS,
  now: Date = new Date(),
): Promise<PurgeResult> {
  const cutoff = new Date(now.getTime() - retentionDays * DAY_MS);
  const result = await store.purgeOlderThan(cutoff);

  log.info({ cutoff: cutoff.toISOString(), ...result }, 'Retention purge completed');
  return result;
}
