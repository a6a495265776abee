import type { CorrelationRecord, IndexEvent, ItemTouch } from '../../domain/index.js';
import { isErrorEvent, sortChronologically } from '../../domain/index.js';
import type { EventStore, PurgeResult, SessionListing } from '../../application/ports.js';

/**
 * Process-local event store.
 *
 * Backs the `memory` sink and stands in for Postgres in tests. Same
 * ordering, filtering and `event_id` deduplication as the Postgres store;
 * nothing survives a restart.
 */
export class InMemoryEventStore implements EventStore {
  private events: IndexEvent[] = [];
  private touches: ItemTouch[] = [];
  private correlations: CorrelationRecord[] = [];
  private eventIds = new Set<string>();
  private correlationIds = new Set<string>();

  async writeBatch(batch: readonly IndexEvent[]): Promise<void> {
    for (const event of batch) {
      if (this.eventIds.has(event.event_id)) continue;
      this.eventIds.add(event.event_id);
      this.events.push(event);
    }
  }

  async insertCorrelation(record: CorrelationRecord): Promise<void> {
    if (this.correlationIds.has(record.event_id)) return;
    this.correlationIds.add(record.event_id);
    this.correlations.push(record);
  }

  async findRecentTouches(itemId: number, since: string, until: string): Promise<ItemTouch[]> {
    const from = Date.parse(since);
    const to = Date.parse(until);
    return this.touches.filter((t) => {
      const ts = Date.parse(t.timestamp);
      return t.item_id === itemId && ts >= from && ts <= to;
    });
  }

  async recordTouch(touch: ItemTouch): Promise<void> {
    this.touches.push(touch);
  }

  async findSessionEvents(sessionId: string): Promise<IndexEvent[]> {
    return sortChronologically(this.events.filter((e) => e.session_id === sessionId));
  }

  async findCorrelations(maxGapMs: number): Promise<CorrelationRecord[]> {
    return this.correlations.filter((r) => r.gap_ms <= maxGapMs);
  }

  async listSessions(limit: number): Promise<SessionListing[]> {
    const sessions = new Map<string, { first: number; last: number; events: number; errors: number }>();

    for (const event of this.events) {
      const ts = Date.parse(event.timestamp);
      const entry = sessions.get(event.session_id) ?? { first: ts, last: ts, events: 0, errors: 0 };
      entry.first = Math.min(entry.first, ts);
      entry.last = Math.max(entry.last, ts);
      entry.events++;
      if (isErrorEvent(event)) entry.errors++;
      sessions.set(event.session_id, entry);
    }

    return [...sessions]
      .sort(([, a], [, b]) => b.last - a.last)
      .slice(0, limit)
      .map(([session_id, s]) => ({
        session_id,
        start_time: new Date(s.first).toISOString(),
        end_time: new Date(s.last).toISOString(),
        event_count: s.events,
        error_count: s.errors,
      }));
  }

  async purgeOlderThan(cutoff: Date): Promise<PurgeResult> {
    const limit = cutoff.getTime();
    const before = {
      events: this.events.length,
      touches: this.touches.length,
      correlations: this.correlations.length,
    };

    this.events = this.events.filter((e) => Date.parse(e.timestamp) >= limit);
    this.touches = this.touches.filter((t) => Date.parse(t.timestamp) >= limit);
    this.correlations = this.correlations.filter((r) => Date.parse(r.detected_at) >= limit);
    this.eventIds = new Set(this.events.map((e) => e.event_id));
    this.correlationIds = new Set(this.correlations.map((r) => r.event_id));

    return {
      events: before.events - this.events.length,
      touches: before.touches - this.touches.length,
      correlations: before.correlations - this.correlations.length,
    };
  }

  /** Number of stored events, across all sessions. */
  get size(): number {
    return this.events.length;
  }
}
