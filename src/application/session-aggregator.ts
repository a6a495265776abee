import type { AnalysisResult, EventStage, IndexEvent, StatusCounts } from '../domain/index.js';
import {
  deriveFinalStatus,
  emptyStatusCounts,
  groupByItem,
  isErrorEvent,
  sessionNotFound,
} from '../domain/index.js';
import type { EventReader } from './ports.js';
import { readPayload, summaryPayloadSchema } from './payload-schema.js';

export interface SessionSummary {
  session_id: string;
  total_items: number;
  status_counts: StatusCounts;
  error_count: number;
  event_count: number;
  events_by_stage: Partial<Record<EventStage, number>>;
  start_time: string;
  end_time: string;
  duration_seconds: number;
  /** True until a summary event has been written. */
  open: boolean;
  /** Figures the pipeline reported in its summary event, if any. */
  reported: { duration_seconds: number | null; memory_peak: number | null } | null;
}

/**
 * Computes session statistics from its events.
 *
 * Pure; the caller guarantees `events` is non-empty and belongs to
 * `sessionId`.
 */
export function buildSessionSummary(sessionId: string, events: readonly IndexEvent[]): SessionSummary {
  const status_counts = emptyStatusCounts();
  const items = groupByItem(events);
  for (const itemEvents of items.values()) {
    status_counts[deriveFinalStatus(itemEvents)]++;
  }

  const events_by_stage: Partial<Record<EventStage, number>> = {};
  let error_count = 0;
  let first = Infinity;
  let last = -Infinity;
  let closing: IndexEvent | undefined;

  for (const event of events) {
    events_by_stage[event.stage] = (events_by_stage[event.stage] ?? 0) + 1;
    if (isErrorEvent(event)) error_count++;

    const ts = Date.parse(event.timestamp);
    first = Math.min(first, ts);
    last = Math.max(last, ts);

    if (event.stage === 'summary' && (closing === undefined || ts >= Date.parse(closing.timestamp))) {
      closing = event;
    }
  }

  const end = closing !== undefined ? Date.parse(closing.timestamp) : last;
  const reported = closing !== undefined ? readPayload(summaryPayloadSchema, closing.payload) : null;

  return {
    session_id: sessionId,
    total_items: items.size,
    status_counts,
    error_count,
    event_count: events.length,
    events_by_stage,
    start_time: new Date(first).toISOString(),
    end_time: new Date(end).toISOString(),
    duration_seconds: Math.max(0, (end - first) / 1000),
    open: closing === undefined,
    reported,
  };
}

/** Use case: summarize one session, or report that it has no events. */
export async function summarizeSession(
  store: EventReader,
  sessionId: string,
): Promise<AnalysisResult<SessionSummary>> {
  const events = await store.findSessionEvents(sessionId);
  if (events.length === 0) return sessionNotFound(sessionId);
  return { found: true, data: buildSessionSummary(sessionId, events) };
}
