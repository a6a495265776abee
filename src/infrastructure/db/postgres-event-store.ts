import { sql } from 'drizzle-orm';
import type { CorrelationRecord, IndexEvent, ItemTouch } from '../../domain/index.js';
import type { EventStore, PurgeResult, SessionListing } from '../../application/ports.js';
import type { Database } from './client.js';
import { deleteEventsBefore, findSessionEvents, insertEvents, listSessions } from './event-repository.js';
import {
  deleteCorrelationsBefore,
  deleteTouchesBefore,
  findCorrelations,
  findTouches,
  insertCorrelation,
  insertTouch,
} from './race-repository.js';

/** Event store backed by the Postgres tables in `schema.ts`. */
export class PostgresEventStore implements EventStore {
  constructor(private readonly db: Database) {}

  /** Round-trips a trivial query; rejects when the database is unreachable. */
  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }

  writeBatch(events: readonly IndexEvent[]): Promise<void> {
    return insertEvents(this.db, events);
  }

  insertCorrelation(record: CorrelationRecord): Promise<void> {
    return insertCorrelation(this.db, record);
  }

  findRecentTouches(itemId: number, since: string, until: string): Promise<ItemTouch[]> {
    return findTouches(this.db, itemId, since, until);
  }

  recordTouch(touch: ItemTouch): Promise<void> {
    return insertTouch(this.db, touch);
  }

  findSessionEvents(sessionId: string): Promise<IndexEvent[]> {
    return findSessionEvents(this.db, sessionId);
  }

  findCorrelations(maxGapMs: number): Promise<CorrelationRecord[]> {
    return findCorrelations(this.db, maxGapMs);
  }

  listSessions(limit: number): Promise<SessionListing[]> {
    return listSessions(this.db, limit);
  }

  async purgeOlderThan(cutoff: Date): Promise<PurgeResult> {
    const [events, touches, correlations] = await Promise.all([
      deleteEventsBefore(this.db, cutoff),
      deleteTouchesBefore(this.db, cutoff),
      deleteCorrelationsBefore(this.db, cutoff),
    ]);
    return { events, touches, correlations };
  }
}
