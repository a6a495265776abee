import type { IndexEvent } from '../src/domain/index.js';
import { at, makeEvent } from './helpers.js';

/**
 * One small session 'S':
 *  item 1 indexed, item 2 skipped ('draft'), item 3 failed at generation,
 *  item 4 retrieved only, plus one batch-level sanitization event.
 */
export function sessionFixture(sessionId = 'S'): IndexEvent[] {
  const e = (overrides: Partial<IndexEvent>) => makeEvent({ session_id: sessionId, ...overrides });

  return [
    e({ item_id: 1, item_type: 'post', stage: 'retrieval', timestamp: at(0) }),
    e({ item_id: 2, item_type: 'post', stage: 'retrieval', timestamp: at(0) }),
    e({ item_id: 1, stage: 'filtering', level: 'debug', timestamp: at(1), payload: { should_index: true } }),
    e({
      item_id: 2,
      stage: 'filtering',
      level: 'debug',
      timestamp: at(1),
      payload: { should_index: false, skip_reason: 'draft' },
    }),
    e({ item_id: 3, item_type: 'page', stage: 'retrieval', timestamp: at(1) }),
    e({ item_id: 1, stage: 'generation', timestamp: at(2), payload: { records_count: 3 } }),
    e({ item_id: 3, stage: 'generation', level: 'error', timestamp: at(2), payload: { error: 'boom' } }),
    e({ item_id: 4, item_type: 'post', stage: 'retrieval', timestamp: at(2) }),
    e({
      item_id: 0,
      stage: 'sanitization',
      timestamp: at(3),
      payload: { initial_count: 10, final_count: 8, dropped_count: 2 },
    }),
    e({ item_id: 1, stage: 'submission', timestamp: at(3), payload: { success: true, records_count: 3 } }),
  ];
}

export function summaryEvent(sessionId = 'S', seconds = 5): IndexEvent {
  return makeEvent({
    session_id: sessionId,
    item_id: 0,
    stage: 'summary',
    level: 'stats',
    timestamp: at(seconds),
    payload: { duration_seconds: 5, memory_peak: 1024, total_items: 4 },
  });
}
