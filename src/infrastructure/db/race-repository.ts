import { and, asc, eq, gte, lt, lte } from 'drizzle-orm';
import type { CorrelationRecord, ItemTouch } from '../../domain/index.js';
import { isEventStage } from '../../domain/index.js';
import type { Database } from './client.js';
import { correlations, itemTouches } from './schema.js';

// ─── Touches ────────────────────────────────────────────────────────

export async function insertTouch(db: Database, touch: ItemTouch): Promise<void> {
  await db.insert(itemTouches).values({
    item_id: touch.item_id,
    session_id: touch.session_id,
    stage: touch.stage,
    timestamp: new Date(touch.timestamp),
  });
}

/** Touches of one item with `since <= timestamp <= until`, oldest first. */
export async function findTouches(
  db: Database,
  itemId: number,
  since: string,
  until: string,
): Promise<ItemTouch[]> {
  const rows = await db
    .select()
    .from(itemTouches)
    .where(and(
      eq(itemTouches.item_id, itemId),
      gte(itemTouches.timestamp, new Date(since)),
      lte(itemTouches.timestamp, new Date(until)),
    ))
    .orderBy(asc(itemTouches.timestamp));

  return rows.flatMap((row) => (isEventStage(row.stage)
    ? [{
        item_id: row.item_id,
        session_id: row.session_id,
        stage: row.stage,
        timestamp: row.timestamp.toISOString(),
      }]
    : []));
}

export async function deleteTouchesBefore(db: Database, cutoff: Date): Promise<number> {
  const deleted = await db
    .delete(itemTouches)
    .where(lt(itemTouches.timestamp, cutoff))
    .returning({ id: itemTouches.id });

  return deleted.length;
}

// ─── Correlations ───────────────────────────────────────────────────

/** One row per triggering event; a repeated insert is a no-op. */
export async function insertCorrelation(db: Database, record: CorrelationRecord): Promise<void> {
  await db.insert(correlations).values({
    event_id: record.event_id,
    item_id: record.item_id,
    stage: record.stage,
    session_id: record.session_id,
    sessions: [...record.sessions],
    stages: [...record.stages],
    first_seen: new Date(record.first_seen),
    last_seen: new Date(record.last_seen),
    occurrence_count: record.occurrence_count,
    gap_ms: record.gap_ms,
    detected_at: new Date(record.detected_at),
  }).onConflictDoNothing({ target: correlations.event_id });
}

/** Correlation records whose gap is within `maxGapMs`, in detection order. */
export async function findCorrelations(db: Database, maxGapMs: number): Promise<CorrelationRecord[]> {
  const rows = await db
    .select()
    .from(correlations)
    .where(lte(correlations.gap_ms, maxGapMs))
    .orderBy(asc(correlations.id));

  return rows.flatMap((row) => (isEventStage(row.stage)
    ? [{
        event_id: row.event_id,
        item_id: row.item_id,
        stage: row.stage,
        session_id: row.session_id,
        sessions: row.sessions,
        stages: row.stages.filter(isEventStage),
        first_seen: row.first_seen.toISOString(),
        last_seen: row.last_seen.toISOString(),
        occurrence_count: row.occurrence_count,
        gap_ms: row.gap_ms,
        detected_at: row.detected_at.toISOString(),
      }]
    : []));
}

export async function deleteCorrelationsBefore(db: Database, cutoff: Date): Promise<number> {
  const deleted = await db
    .delete(correlations)
    .where(lt(correlations.detected_at, cutoff))
    .returning({ id: correlations.id });

  return deleted.length;
}
