import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventBuffer, deriveLevel } from '../../src/application/event-buffer.js';
import { RaceDetector } from '../../src/application/race-detector.js';
import { startIngestionSession } from '../../src/application/ingestion-session.js';
import type { EventSink } from '../../src/application/ports.js';
import { WriteFailedError } from '../../src/domain/index.js';
import { InMemoryEventStore } from '../../src/infrastructure/memory/index.js';
import { BASE_MS, at, fakeLogger } from '../helpers.js';

/** Clock that advances one second per reading. */
function tickingClock(startMs = BASE_MS) {
  let now = startMs - 1000;
  return () => (now += 1000);
}

let store: InMemoryEventStore;
let log: ReturnType<typeof fakeLogger>;

beforeEach(() => {
  store = new InMemoryEventStore();
  log = fakeLogger();
});

// ─── deriveLevel ─────────────────────────────────────────────

describe('deriveLevel', () => {
  it('returns error for a non-empty error string', () => {
    expect(deriveLevel({ error: 'boom' })).toBe('error');
  });

  it('returns info otherwise', () => {
    expect(deriveLevel({})).toBe('info');
    expect(deriveLevel({ error: '' })).toBe('info');
    expect(deriveLevel({ error: 42 })).toBe('info');
  });
});

// ─── track / flush ───────────────────────────────────────────

describe('EventBuffer', () => {
  it('round-trips tracked events through flush in order', async () => {
    const session = startIngestionSession({ sessionId: 'idx_rt', nowFn: tickingClock() });
    const buffer = new EventBuffer({ sink: store, session, log });

    const tracked = [
      await buffer.track(1, 'retrieval', { type: 'post' }),
      await buffer.track(1, 'filtering', { should_index: true }, 'debug'),
      await buffer.track(1, 'generation', { records_count: 3 }),
    ];

    expect(buffer.pending).toBe(3);
    expect(store.size).toBe(0);

    const written = await buffer.flush();

    expect(written).toBe(3);
    expect(buffer.pending).toBe(0);
    expect(await store.findSessionEvents('idx_rt')).toEqual(tracked);
  });

  it('stamps events with the session id and a non-decreasing clock', async () => {
    const session = startIngestionSession({ sessionId: 'idx_ts', nowFn: tickingClock() });
    const buffer = new EventBuffer({ sink: store, session, log });

    const first = await buffer.track(5, 'retrieval');
    const second = await buffer.track(5, 'filtering');

    expect(first.session_id).toBe('idx_ts');
    expect(first.timestamp).toBe(at(1));
    expect(second.timestamp).toBe(at(2));
  });

  it('queues a copy of the payload', async () => {
    const session = startIngestionSession({ sessionId: 'idx_cp' });
    const buffer = new EventBuffer({ sink: store, session, log });
    const payload: Record<string, unknown> = { type: 'post' };

    await buffer.track(3, 'retrieval', payload);
    payload['type'] = 'page';
    payload['error'] = 'late';
    await buffer.flush();

    const [stored] = await store.findSessionEvents('idx_cp');
    expect(stored?.payload).toEqual({ type: 'post' });
  });

  it('assigns every tracked event its own id', async () => {
    const buffer = new EventBuffer({ sink: store, session: startIngestionSession(), log });

    const first = await buffer.track(1, 'retrieval');
    const second = await buffer.track(1, 'retrieval');

    expect(first.event_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(second.event_id).not.toBe(first.event_id);
  });

  it('derives level and item_type from the payload', async () => {
    const session = startIngestionSession({ sessionId: 'idx_lv' });
    const buffer = new EventBuffer({ sink: store, session, log });

    const failed = await buffer.track(2, 'generation', { error: 'boom', type: 'page' });
    const explicit = await buffer.track(2, 'filtering', { error: 'ignored' }, 'debug');

    expect(failed.level).toBe('error');
    expect(failed.item_type).toBe('page');
    expect(explicit.level).toBe('debug');
    expect(explicit.item_type).toBeUndefined();
  });

  it('flushes automatically at the threshold', async () => {
    const session = startIngestionSession({ sessionId: 'idx_th' });
    const buffer = new EventBuffer({ sink: store, session, log, threshold: 2 });

    await buffer.track(1, 'retrieval');
    expect(store.size).toBe(0);

    await buffer.track(2, 'retrieval');
    expect(store.size).toBe(2);
    expect(buffer.pending).toBe(0);
  });

  it('returns 0 and skips the sink when nothing is queued', async () => {
    const sink: EventSink = { writeBatch: vi.fn().mockResolvedValue(undefined) };
    const buffer = new EventBuffer({ sink, session: startIngestionSession(), log });

    expect(await buffer.flush()).toBe(0);
    expect(sink.writeBatch).not.toHaveBeenCalled();
  });

  it('drops the batch and logs WriteFailedError when the sink fails', async () => {
    const sink: EventSink = { writeBatch: vi.fn().mockRejectedValue(new Error('connection reset')) };
    const buffer = new EventBuffer({ sink, session: startIngestionSession(), log, threshold: 2 });

    await buffer.track(1, 'retrieval');
    await expect(buffer.track(2, 'retrieval')).resolves.toMatchObject({ item_id: 2 });

    expect(buffer.pending).toBe(0);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(WriteFailedError) }),
      'Telemetry batch dropped',
    );

    // the dropped batch is not retried
    expect(await buffer.flush()).toBe(0);
    expect(sink.writeBatch).toHaveBeenCalledTimes(1);
  });

  it('runs race detection before queueing', async () => {
    const clockA = tickingClock(BASE_MS);
    const clockB = tickingClock(BASE_MS + 2000);
    const detectorA = new RaceDetector(store, store, log);
    const detectorB = new RaceDetector(store, store, log);
    const bufferA = new EventBuffer({
      sink: store,
      session: startIngestionSession({ sessionId: 'idx_a', nowFn: clockA }),
      log,
      detector: detectorA,
    });
    const bufferB = new EventBuffer({
      sink: store,
      session: startIngestionSession({ sessionId: 'idx_b', nowFn: clockB }),
      log,
      detector: detectorB,
    });

    await bufferA.track(42, 'retrieval');
    await bufferB.track(42, 'retrieval');

    const records = await store.findCorrelations(10_000);
    expect(records).toHaveLength(1);
    expect(records[0]?.sessions).toEqual(['idx_a', 'idx_b']);
    expect(records[0]?.gap_ms).toBe(2000);
  });
});
