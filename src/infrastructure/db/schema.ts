import { pgTable, bigserial, bigint, varchar, timestamp, jsonb, integer, index, uuid } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `index_events` table.
 *
 * Append-only. `event_id` is assigned when the event is tracked and makes
 * a redelivered write a no-op. `id` only preserves insertion order among
 * events sharing a timestamp; `(session_id, item_id, stage)` is
 * deliberately not unique.
 */
export const indexEvents = pgTable('index_events', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  event_id: uuid('event_id').notNull().unique(),
  session_id: varchar('session_id', { length: 64 }).notNull(),
  item_id: bigint('item_id', { mode: 'number' }).notNull(),
  item_type: varchar('item_type', { length: 64 }),
  stage: varchar('stage', { length: 32 }).notNull(),
  level: varchar('level', { length: 16 }).notNull(),
  timestamp: timestamp('timestamp', { withTimezone: true, precision: 3 }).notNull(),
  payload: jsonb('payload').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_index_events_session_ts').on(table.session_id, table.timestamp),
  index('idx_index_events_item').on(table.item_id),
  index('idx_index_events_timestamp').on(table.timestamp),
]);

/**
 * Drizzle schema for the `item_touches` table.
 *
 * One row per tracked event; read back by item id within the race window.
 */
export const itemTouches = pgTable('item_touches', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  item_id: bigint('item_id', { mode: 'number' }).notNull(),
  session_id: varchar('session_id', { length: 64 }).notNull(),
  stage: varchar('stage', { length: 32 }).notNull(),
  timestamp: timestamp('timestamp', { withTimezone: true, precision: 3 }).notNull(),
}, (table) => [
  index('idx_item_touches_item_ts').on(table.item_id, table.timestamp),
]);

/**
 * Drizzle schema for the `correlations` table.
 *
 * Race detections. Session and stage sets are stored as JSONB arrays.
 * `event_id` is the triggering event; one detection per event.
 */
export const correlations = pgTable('correlations', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  event_id: uuid('event_id').notNull().unique(),
  item_id: bigint('item_id', { mode: 'number' }).notNull(),
  stage: varchar('stage', { length: 32 }).notNull(),
  session_id: varchar('session_id', { length: 64 }).notNull(),
  sessions: jsonb('sessions').$type<string[]>().notNull(),
  stages: jsonb('stages').$type<string[]>().notNull(),
  first_seen: timestamp('first_seen', { withTimezone: true, precision: 3 }).notNull(),
  last_seen: timestamp('last_seen', { withTimezone: true, precision: 3 }).notNull(),
  occurrence_count: integer('occurrence_count').notNull(),
  gap_ms: integer('gap_ms').notNull(),
  detected_at: timestamp('detected_at', { withTimezone: true, precision: 3 }).notNull(),
}, (table) => [
  index('idx_correlations_item').on(table.item_id),
  index('idx_correlations_detected_at').on(table.detected_at),
]);
