import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_RACE_PARAMS,
  aggregateRaces,
  detectRaces,
  resolveRaceParams,
} from '../../src/application/race-report.js';
import type { EventReader } from '../../src/application/ports.js';
import type { CorrelationRecord } from '../../src/domain/index.js';
import { at, uuid } from '../helpers.js';

function record(overrides: Partial<CorrelationRecord>): CorrelationRecord {
  return {
    event_id: uuid(1),
    item_id: 42,
    stage: 'retrieval',
    session_id: 'B',
    sessions: ['A', 'B'],
    stages: ['retrieval'],
    first_seen: at(0),
    last_seen: at(3),
    occurrence_count: 2,
    gap_ms: 3000,
    detected_at: at(3),
    ...overrides,
  };
}

const RECORDS: CorrelationRecord[] = [
  record({}),
  record({
    stage: 'submission',
    session_id: 'C',
    sessions: ['A', 'C'],
    stages: ['submission'],
    first_seen: at(10),
    last_seen: at(15),
    gap_ms: 5000,
  }),
  record({ item_id: 7, first_seen: at(20), last_seen: at(22), gap_ms: 2000 }),
  record({ item_id: 9, first_seen: at(30), last_seen: at(50), gap_ms: 20_000 }),
];

// ─── resolveRaceParams ───────────────────────────────────────

describe('resolveRaceParams', () => {
  it('applies defaults', () => {
    expect(resolveRaceParams({})).toEqual({ min_concurrent: 2, time_window: 10, limit: 100 });
  });

  it('clamps out-of-range values', () => {
    expect(resolveRaceParams({ min_concurrent: 1, time_window: 0, limit: 1000 })).toEqual({
      min_concurrent: 2,
      time_window: 1,
      limit: 500,
    });
    expect(resolveRaceParams({ time_window: 99_999, limit: -3 })).toEqual({
      min_concurrent: 2,
      time_window: 3600,
      limit: 1,
    });
  });

  it('rejects non-integers', () => {
    expect(resolveRaceParams({ limit: 1.5 })).toBeNull();
    expect(resolveRaceParams({ time_window: Number.NaN })).toBeNull();
  });
});

// ─── aggregateRaces ──────────────────────────────────────────

describe('aggregateRaces', () => {
  it('folds records per item and orders by occurrence count', () => {
    const report = aggregateRaces(RECORDS, DEFAULT_RACE_PARAMS);

    expect(report.total_items_affected).toBe(2);
    expect(report.top_concurrent_items).toEqual([
      {
        item_id: 42,
        occurrence_count: 2,
        concurrent_sessions: 3,
        sessions: ['A', 'B', 'C'],
        stages: ['retrieval', 'submission'],
        first_seen: at(0),
        last_seen: at(15),
      },
      {
        item_id: 7,
        occurrence_count: 1,
        concurrent_sessions: 2,
        sessions: ['A', 'B'],
        stages: ['retrieval'],
        first_seen: at(20),
        last_seen: at(22),
      },
    ]);
    expect(report.stage_patterns).toEqual({ retrieval: 2, submission: 1 });
    expect(report.hourly_patterns).toEqual({ '10': 3 });
  });

  it('requires min_concurrent distinct sessions', () => {
    const report = aggregateRaces(RECORDS, { ...DEFAULT_RACE_PARAMS, min_concurrent: 3 });

    expect(report.top_concurrent_items.map((i) => i.item_id)).toEqual([42]);
    expect(report.stage_patterns).toEqual({ retrieval: 1, submission: 1 });
  });

  it('counts every qualifying item before applying the limit', () => {
    const report = aggregateRaces(RECORDS, { ...DEFAULT_RACE_PARAMS, limit: 1 });

    expect(report.total_items_affected).toBe(2);
    expect(report.top_concurrent_items.map((i) => i.item_id)).toEqual([42]);
  });

  it('widens the gap filter with time_window', () => {
    const report = aggregateRaces(RECORDS, { ...DEFAULT_RACE_PARAMS, time_window: 30 });

    expect(report.top_concurrent_items.map((i) => i.item_id)).toEqual([42, 7, 9]);
  });

  it('returns an empty report for no records', () => {
    expect(aggregateRaces([], DEFAULT_RACE_PARAMS)).toEqual({
      params: DEFAULT_RACE_PARAMS,
      total_items_affected: 0,
      top_concurrent_items: [],
      stage_patterns: {},
      hourly_patterns: {},
    });
  });
});

// ─── detectRaces ─────────────────────────────────────────────

describe('detectRaces', () => {
  function fakeReader(records: CorrelationRecord[]): EventReader {
    return {
      findSessionEvents: vi.fn(),
      findCorrelations: vi.fn().mockResolvedValue(records),
      listSessions: vi.fn(),
    };
  }

  it('queries correlations up to the window in milliseconds', async () => {
    const store = fakeReader(RECORDS);

    const report = await detectRaces(store, { time_window: 30 });

    expect(store.findCorrelations).toHaveBeenCalledWith(30_000);
    expect(report.params.time_window).toBe(30);
  });

  it('falls back to defaults for invalid params', async () => {
    const store = fakeReader([]);

    const report = await detectRaces(store, { limit: 2.5 });

    expect(store.findCorrelations).toHaveBeenCalledWith(10_000);
    expect(report.params).toEqual(DEFAULT_RACE_PARAMS);
  });
});
