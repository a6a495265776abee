import type { EventStage } from './event.js';
import { stageRank } from './event.js';

/** One recorded access of an item by a session; the race-detection candidate. */
export interface ItemTouch {
  readonly item_id: number;
  readonly session_id: string;
  readonly stage: EventStage;
  readonly timestamp: string; // ISO-8601
}

/**
 * Heuristic evidence that several sessions touched one item within a short
 * window. Built from timestamp proximity only; the pipeline offers no locks
 * or transaction ids to prove real concurrency.
 */
export interface CorrelationRecord {
  /** Event that triggered the detection; at most one record per event. */
  readonly event_id: string;
  readonly item_id: number;
  readonly stage: EventStage;
  /** Session whose event triggered the detection. */
  readonly session_id: string;
  readonly sessions: readonly string[];
  readonly stages: readonly EventStage[];
  readonly first_seen: string;
  readonly last_seen: string;
  readonly occurrence_count: number;
  /** Time from the earliest foreign touch to the triggering event. */
  readonly gap_ms: number;
  readonly detected_at: string;
}

/**
 * Correlates a new touch with recent touches of the same item.
 *
 * Returns one record when at least one touch inside
 * `[current - windowMs, current]` belongs to a different session, listing
 * the union of sessions and stages seen (current touch included).
 * Same-session revisits alone never correlate.
 *
 * Pure function: the caller supplies the recent touches, the clock and the
 * id of the triggering event.
 */
export function correlateTouches(
  eventId: string,
  current: ItemTouch,
  recent: readonly ItemTouch[],
  windowMs: number,
  detectedAt: string,
): CorrelationRecord | null {
  const now = Date.parse(current.timestamp);
  const windowStart = now - windowMs;

  const inWindow = recent.filter((t) => {
    const ts = Date.parse(t.timestamp);
    return t.item_id === current.item_id && ts >= windowStart && ts <= now;
  });

  const foreign = inWindow.filter((t) => t.session_id !== current.session_id);
  if (foreign.length === 0) return null;

  const involved = [...inWindow, current];
  const sessions = [...new Set(involved.map((t) => t.session_id))].sort();
  const stages = [...new Set(involved.map((t) => t.stage))].sort(
    (a, b) => stageRank(a) - stageRank(b),
  );

  const firstSeen = Math.min(...inWindow.map((t) => Date.parse(t.timestamp)));
  const firstForeign = Math.min(...foreign.map((t) => Date.parse(t.timestamp)));

  return {
    event_id: eventId,
    item_id: current.item_id,
    stage: current.stage,
    session_id: current.session_id,
    sessions,
    stages,
    first_seen: new Date(firstSeen).toISOString(),
    last_seen: current.timestamp,
    occurrence_count: involved.length,
    gap_ms: now - firstForeign,
    detected_at: detectedAt,
  };
}
