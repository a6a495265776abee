import type { Sql } from 'postgres';

/**
 * Creates the telemetry tables and indexes if missing.
 *
 * Lightweight bootstrap for local runs; `drizzle-kit` generates the
 * equivalent migrations from `schema.ts`.
 */
export async function ensureTables(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS index_events (
      id          BIGSERIAL    PRIMARY KEY,
      event_id    UUID         NOT NULL UNIQUE,
      session_id  VARCHAR(64)  NOT NULL,
      item_id     BIGINT       NOT NULL,
      item_type   VARCHAR(64),
      stage       VARCHAR(32)  NOT NULL,
      level       VARCHAR(16)  NOT NULL,
      timestamp   TIMESTAMPTZ(3) NOT NULL,
      payload     JSONB        NOT NULL DEFAULT '{}',
      created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS item_touches (
      id          BIGSERIAL    PRIMARY KEY,
      item_id     BIGINT       NOT NULL,
      session_id  VARCHAR(64)  NOT NULL,
      stage       VARCHAR(32)  NOT NULL,
      timestamp   TIMESTAMPTZ(3) NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS correlations (
      id                BIGSERIAL    PRIMARY KEY,
      event_id          UUID         NOT NULL UNIQUE,
      item_id           BIGINT       NOT NULL,
      stage             VARCHAR(32)  NOT NULL,
      session_id        VARCHAR(64)  NOT NULL,
      sessions          JSONB        NOT NULL,
      stages            JSONB        NOT NULL,
      first_seen        TIMESTAMPTZ(3) NOT NULL,
      last_seen         TIMESTAMPTZ(3) NOT NULL,
      occurrence_count  INTEGER      NOT NULL,
      gap_ms            INTEGER      NOT NULL,
      detected_at       TIMESTAMPTZ(3) NOT NULL
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_index_events_session_ts ON index_events (session_id, timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_index_events_item ON index_events (item_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_index_events_timestamp ON index_events (timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_item_touches_item_ts ON item_touches (item_id, timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_correlations_item ON correlations (item_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_correlations_detected_at ON correlations (detected_at)`);
}
