import { describe, it, expect, beforeEach } from 'vitest';
import {
  ItemTimeline,
  analyzeSessionStages,
  analyzeStages,
  compareSessions,
  compareSessionsById,
  findMissing,
  findMissingItems,
  getItemTimeline,
} from '../../src/application/analyzer.js';
import { InMemoryEventStore } from '../../src/infrastructure/memory/index.js';
import { at, makeEvent } from '../helpers.js';
import { sessionFixture } from '../fixtures.js';

// ─── findMissing ─────────────────────────────────────────────

describe('findMissing', () => {
  it('splits expected items into never seen and retrieved but unprocessed', () => {
    const events = [
      makeEvent({ item_id: 1, stage: 'retrieval', timestamp: at(0) }),
      makeEvent({ item_id: 1, stage: 'submission', timestamp: at(1) }),
      makeEvent({ item_id: 2, stage: 'retrieval', timestamp: at(0) }),
      makeEvent({ item_id: 2, stage: 'filtering', timestamp: at(1), payload: { should_index: true } }),
    ];

    expect(findMissing('sess-a', events, [1, 2, 3])).toEqual({
      session_id: 'sess-a',
      expected_count: 3,
      retrieved_count: 2,
      processed_count: 1,
      never_seen: [3],
      retrieved_not_processed: [2],
      by_stage: { filtering: [2] },
      status_counts: { indexed: 1, skipped: 0, failed: 0, unknown: 1 },
    });
  });

  it('counts duplicate expected ids once', () => {
    expect(findMissing('sess-a', [], [5, 5, 4]).never_seen).toEqual([4, 5]);
    expect(findMissing('sess-a', [], [5, 5, 4]).expected_count).toBe(2);
  });

  it('reports retrieved items that were not expected', () => {
    const events = [makeEvent({ item_id: 9, stage: 'retrieval' })];

    expect(findMissing('sess-a', events, []).retrieved_not_processed).toEqual([9]);
  });

  it('groups by the chronologically last stage reached', () => {
    const events = [
      makeEvent({ item_id: 2, stage: 'generation', timestamp: at(2) }),
      makeEvent({ item_id: 2, stage: 'retrieval', timestamp: at(0) }),
      makeEvent({ item_id: 3, stage: 'retrieval', timestamp: at(0) }),
    ];

    expect(findMissing('sess-a', events, [2, 3]).by_stage).toEqual({ generation: [2], retrieval: [3] });
  });

  it('counts a filtered-out item as skipped and lists it under filtering', () => {
    const events = [
      makeEvent({ item_id: 5, stage: 'retrieval', timestamp: at(0) }),
      makeEvent({
        item_id: 5,
        stage: 'filtering',
        timestamp: at(1),
        payload: { should_index: false, skip_reason: 'draft' },
      }),
    ];

    const report = findMissing('sess-a', events, [5]);

    expect(report.retrieved_not_processed).toEqual([5]);
    expect(report.by_stage).toEqual({ filtering: [5] });
    expect(report.status_counts).toEqual({ indexed: 0, skipped: 1, failed: 0, unknown: 0 });
  });
});

// ─── ItemTimeline ────────────────────────────────────────────

describe('ItemTimeline', () => {
  it('yields only the item events in chronological order, repeatedly', () => {
    const timeline = new ItemTimeline('S', 3, sessionFixture());

    const stages = [...timeline].map((e) => e.stage);
    expect(stages).toEqual(['retrieval', 'generation']);
    expect([...timeline].map((e) => e.stage)).toEqual(stages);
  });

  it('serializes with the derived final status', () => {
    const json = new ItemTimeline('S', 3, sessionFixture()).toJSON();

    expect(json.session_id).toBe('S');
    expect(json.item_id).toBe(3);
    expect(json.final_status).toBe('failed');
    expect(json.events).toHaveLength(2);
  });
});

// ─── compareSessions ─────────────────────────────────────────

describe('compareSessions', () => {
  it('reports item-set and stage differences as a minus b', () => {
    const a = [
      makeEvent({ session_id: 'A', item_id: 1 }),
      makeEvent({ session_id: 'A', item_id: 2 }),
      makeEvent({ session_id: 'A', item_id: 2, stage: 'generation', level: 'error' }),
    ];
    const b = [
      makeEvent({ session_id: 'B', item_id: 2 }),
      makeEvent({ session_id: 'B', item_id: 3 }),
      makeEvent({ session_id: 'B', item_id: 3, stage: 'submission' }),
    ];

    const diff = compareSessions('A', a, 'B', b);

    expect(diff.only_in_a).toEqual([1]);
    expect(diff.only_in_b).toEqual([3]);
    expect(diff.in_both).toEqual([2]);
    expect(diff.stage_deltas.retrieval).toEqual({ a: 2, b: 2, difference: 0 });
    expect(diff.stage_deltas.generation).toEqual({ a: 1, b: 0, difference: 1 });
    expect(diff.stage_deltas.submission).toEqual({ a: 0, b: 1, difference: -1 });
    expect(diff.error_counts).toEqual({ a: 1, b: 0 });
  });

  it('is symmetric when the sessions are swapped', () => {
    const a = sessionFixture('A');
    const b = sessionFixture('B').filter((e) => e.item_id !== 4);

    const forward = compareSessions('A', a, 'B', b);
    const backward = compareSessions('B', b, 'A', a);

    expect(backward.only_in_a).toEqual(forward.only_in_b);
    expect(backward.only_in_b).toEqual(forward.only_in_a);
    expect(backward.in_both).toEqual(forward.in_both);
    expect(backward.stage_deltas.retrieval.difference).toBe(-forward.stage_deltas.retrieval.difference);
  });
});

// ─── analyzeStages ───────────────────────────────────────────

describe('analyzeStages', () => {
  it('counts outcomes per stage', () => {
    expect(analyzeStages('S', sessionFixture())).toEqual({
      session_id: 'S',
      total_events: 10,
      retrieval: { count: 4, items: 4 },
      filtering: { count: 2, passed: 1, skipped: 1, reasons: { draft: 1 } },
      generation: { count: 2, success: 1, failed: 1 },
      sanitization: { count: 1, records_dropped: 2 },
      submission: { count: 1, success: 1, failed: 0 },
      deletion: { count: 0 },
      errors: { total_count: 1, by_stage: { generation: 1 } },
    });
  });

  it('falls back to the legacy reason field, then to Unknown', () => {
    const analysis = analyzeStages('S', [
      makeEvent({ stage: 'filtering', payload: { should_index: false, reason: 'private' } }),
      makeEvent({ stage: 'filtering', payload: { should_index: false } }),
    ]);

    expect(analysis.filtering.reasons).toEqual({ private: 1, Unknown: 1 });
  });

  it('derives dropped records from counts when dropped_count is absent', () => {
    const analysis = analyzeStages('S', [
      makeEvent({ item_id: 0, stage: 'sanitization', payload: { initial_count: 7, final_count: 4 } }),
    ]);

    expect(analysis.sanitization.records_dropped).toBe(3);
  });

  it('counts success=false submissions as failed', () => {
    const analysis = analyzeStages('S', [makeEvent({ stage: 'submission', payload: { success: false } })]);

    expect(analysis.submission).toEqual({ count: 1, success: 0, failed: 1 });
  });
});

// ─── Store-backed use cases ──────────────────────────────────

describe('analyzer use cases', () => {
  let store: InMemoryEventStore;

  beforeEach(async () => {
    store = new InMemoryEventStore();
    await store.writeBatch(sessionFixture('S'));
  });

  it('findMissingItems returns not found for an unknown session', async () => {
    expect(await findMissingItems(store, 'nope', [1])).toEqual({
      found: false,
      session_id: 'nope',
      error: 'No events found for session nope',
    });
  });

  it('findMissingItems analyzes a stored session', async () => {
    const result = await findMissingItems(store, 'S', [1, 2, 3, 4, 5]);

    expect(result.found && result.data.never_seen).toEqual([5]);
    expect(result.found && result.data.retrieved_not_processed).toEqual([2, 3, 4]);
  });

  it('getItemTimeline distinguishes a missing item from a missing session', async () => {
    expect(await getItemTimeline(store, 'S', 99)).toEqual({
      found: false,
      session_id: 'S',
      error: 'No events found for item 99 in session S',
    });

    const result = await getItemTimeline(store, 'S', 1);
    expect(result.found && result.data.toJSON().final_status).toBe('indexed');
  });

  it('compareSessionsById reports whichever session is missing', async () => {
    const result = await compareSessionsById(store, 'S', 'T');

    expect(result).toEqual({ found: false, session_id: 'T', error: 'No events found for session T' });
  });

  it('analyzeSessionStages wraps analyzeStages', async () => {
    const result = await analyzeSessionStages(store, 'S');

    expect(result.found && result.data.total_events).toBe(10);
  });
});
