import { asc, count, desc, eq, lt, max, min, sql } from 'drizzle-orm';
import type { IndexEvent } from '../../domain/index.js';
import { isEventLevel, isEventStage } from '../../domain/index.js';
import type { SessionListing } from '../../application/ports.js';
import type { Database } from './client.js';
import { indexEvents } from './schema.js';

type EventRow = typeof indexEvents.$inferSelect;

/**
 * Maps a stored row back to a domain event.
 * Returns null for rows whose stage or level is not one we write.
 */
export function toIndexEvent(row: EventRow): IndexEvent | null {
  if (!isEventStage(row.stage) || !isEventLevel(row.level)) return null;
  return {
    event_id: row.event_id,
    session_id: row.session_id,
    item_id: row.item_id,
    item_type: row.item_type ?? undefined,
    stage: row.stage,
    level: row.level,
    timestamp: row.timestamp.toISOString(),
    payload: row.payload,
  };
}

/**
 * Inserts a batch of events in one statement.
 * Array order becomes `id` order, which breaks timestamp ties on read.
 * Uses ON CONFLICT DO NOTHING on `event_id`, so a redelivered batch is a
 * no-op.
 */
export async function insertEvents(db: Database, batch: readonly IndexEvent[]): Promise<void> {
  if (batch.length === 0) return;

  await db.insert(indexEvents).values(
    batch.map((event) => ({
      event_id: event.event_id,
      session_id: event.session_id,
      item_id: event.item_id,
      item_type: event.item_type ?? null,
      stage: event.stage,
      level: event.level,
      timestamp: new Date(event.timestamp),
      payload: event.payload,
    })),
  ).onConflictDoNothing({ target: indexEvents.event_id });
}

/** All events of one session, by timestamp then insertion order. */
export async function findSessionEvents(db: Database, sessionId: string): Promise<IndexEvent[]> {
  const rows = await db
    .select()
    .from(indexEvents)
    .where(eq(indexEvents.session_id, sessionId))
    .orderBy(asc(indexEvents.timestamp), asc(indexEvents.id));

  return rows.flatMap((row) => toIndexEvent(row) ?? []);
}

/**
 * Most recent sessions, newest activity first.
 *
 * Error counting mirrors `isErrorEvent`: error level or a non-empty
 * `payload.error`.
 */
export async function listSessions(db: Database, limit: number): Promise<SessionListing[]> {
  const lastSeen = max(indexEvents.timestamp);

  const rows = await db
    .select({
      session_id: indexEvents.session_id,
      start_time: min(indexEvents.timestamp),
      end_time: lastSeen,
      event_count: count(),
      error_count: sql<number>`sum(case when ${indexEvents.level} = 'error'
        or coalesce(${indexEvents.payload}->>'error', '') <> '' then 1 else 0 end)`.mapWith(Number),
    })
    .from(indexEvents)
    .groupBy(indexEvents.session_id)
    .orderBy(desc(lastSeen))
    .limit(limit);

  return rows.map((r) => ({
    session_id: r.session_id,
    start_time: r.start_time?.toISOString() ?? '',
    end_time: r.end_time?.toISOString() ?? '',
    event_count: Number(r.event_count),
    error_count: r.error_count,
  }));
}

/** Deletes events older than `cutoff`. Returns the number removed. */
export async function deleteEventsBefore(db: Database, cutoff: Date): Promise<number> {
  const deleted = await db
    .delete(indexEvents)
    .where(lt(indexEvents.timestamp, cutoff))
    .returning({ id: indexEvents.id });

  return deleted.length;
}
