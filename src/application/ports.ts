import type { IndexEvent, ItemTouch, CorrelationRecord } from '../domain/index.js';

/** Destination for flushed event batches. */
export interface EventSink {
  writeBatch(events: readonly IndexEvent[]): Promise<void>;
}

/** Destination for race correlation records. */
export interface CorrelationSink {
  insertCorrelation(record: CorrelationRecord): Promise<void>;
}

/** Recent item accesses used as race-detection candidates. */
export interface TouchStore {
  /** Touches of `itemId` with `since <= timestamp <= until` (ISO-8601). */
  findRecentTouches(itemId: number, since: string, until: string): Promise<ItemTouch[]>;
  recordTouch(touch: ItemTouch): Promise<void>;
}

/** One row of the recent-sessions listing. */
export interface SessionListing {
  session_id: string;
  start_time: string;
  end_time: string;
  event_count: number;
  error_count: number;
}

export interface PurgeResult {
  events: number;
  touches: number;
  correlations: number;
}

/**
 * Read side plus retention of the shared event store.
 *
 * Events come back in write order within a session (timestamp, then
 * insertion sequence).
 */
export interface EventReader {
  findSessionEvents(sessionId: string): Promise<IndexEvent[]>;
  /** Correlation records whose gap is at most `maxGapMs`. */
  findCorrelations(maxGapMs: number): Promise<CorrelationRecord[]>;
  listSessions(limit: number): Promise<SessionListing[]>;
}

export interface RetentionStore {
  purgeOlderThan(cutoff: Date): Promise<PurgeResult>;
}

/** Everything a full store backend provides. */
export interface EventStore extends EventSink, CorrelationSink, TouchStore, EventReader, RetentionStore {}
