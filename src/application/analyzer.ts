import type {
  AnalysisResult,
  FinalStatus,
  IndexEvent,
  PipelineStage,
  StatusCounts,
} from '../domain/index.js';
import {
  TERMINAL_STAGES,
  deriveFinalStatus,
  emptyStatusCounts,
  groupByItem,
  isErrorEvent,
  isPipelineStage,
  sessionNotFound,
  sortChronologically,
} from '../domain/index.js';
import type { EventReader } from './ports.js';
import {
  filteringPayloadSchema,
  readPayload,
  sanitizationPayloadSchema,
  skipReasonOf,
} from './payload-schema.js';

const byNumber = (a: number, b: number): number => a - b;

// ─── Missing items ──────────────────────────────────────────────────

export interface MissingReport {
  session_id: string;
  expected_count: number;
  retrieved_count: number;
  processed_count: number;
  never_seen: number[];
  retrieved_not_processed: number[];
  by_stage: Partial<Record<PipelineStage, number[]>>;
  status_counts: StatusCounts;
}

/**
 * Expected vs observed items for one session.
 *
 * `by_stage` groups every retrieved-but-unprocessed item under the last
 * pipeline stage it reached, chronologically.
 */
export function findMissing(
  sessionId: string,
  events: readonly IndexEvent[],
  expectedIds: readonly number[],
): MissingReport {
  const items = groupByItem(events);
  const expected = [...new Set(expectedIds)];

  const retrieved = new Set<number>();
  const processed = new Set<number>();
  const status_counts = emptyStatusCounts();

  for (const [itemId, itemEvents] of items) {
    if (itemEvents.some((e) => e.stage === 'retrieval')) retrieved.add(itemId);
    if (itemEvents.some((e) => isPipelineStage(e.stage) && TERMINAL_STAGES.has(e.stage))) {
      processed.add(itemId);
    }
    status_counts[deriveFinalStatus(itemEvents)]++;
  }

  const never_seen = expected.filter((id) => !retrieved.has(id)).sort(byNumber);
  const retrieved_not_processed = [...retrieved].filter((id) => !processed.has(id)).sort(byNumber);

  const by_stage: Partial<Record<PipelineStage, number[]>> = {};
  for (const itemId of retrieved_not_processed) {
    const stage = lastPipelineStage(items.get(itemId) ?? []);
    if (stage === undefined) continue;
    (by_stage[stage] ??= []).push(itemId);
  }

  return {
    session_id: sessionId,
    expected_count: expected.length,
    retrieved_count: retrieved.size,
    processed_count: processed.size,
    never_seen,
    retrieved_not_processed,
    by_stage,
    status_counts,
  };
}

function lastPipelineStage(events: readonly IndexEvent[]): PipelineStage | undefined {
  const sorted = sortChronologically(events);
  for (let i = sorted.length - 1; i >= 0; i--) {
    const stage = sorted[i]?.stage;
    if (stage !== undefined && isPipelineStage(stage)) return stage;
  }
  return undefined;
}

// ─── Item timeline ──────────────────────────────────────────────────

/**
 * Chronological events of one item. Iterating it re-sorts the source, so
 * the timeline can be walked any number of times.
 */
export class ItemTimeline implements Iterable<IndexEvent> {
  constructor(
    readonly sessionId: string,
    readonly itemId: number,
    private readonly events: readonly IndexEvent[],
  ) {}

  *[Symbol.iterator](): Iterator<IndexEvent> {
    const own = this.events.filter((e) => e.item_id === this.itemId);
    yield* sortChronologically(own);
  }

  toJSON(): { session_id: string; item_id: number; final_status: FinalStatus; events: IndexEvent[] } {
    const events = [...this];
    return {
      session_id: this.sessionId,
      item_id: this.itemId,
      final_status: deriveFinalStatus(events),
      events,
    };
  }
}

// ─── Session comparison ─────────────────────────────────────────────

export interface StageDelta {
  a: number;
  b: number;
  difference: number;
}

export interface SessionComparison {
  session_a: string;
  session_b: string;
  only_in_a: number[];
  only_in_b: number[];
  in_both: number[];
  stage_deltas: Record<PipelineStage, StageDelta>;
  error_counts: { a: number; b: number };
}

function stageCounts(events: readonly IndexEvent[]): Record<PipelineStage, number> {
  const counts: Record<PipelineStage, number> = {
    retrieval: 0,
    filtering: 0,
    generation: 0,
    sanitization: 0,
    submission: 0,
    deletion: 0,
  };
  for (const event of events) {
    if (isPipelineStage(event.stage)) counts[event.stage]++;
  }
  return counts;
}

/** Item-set and per-stage differences between two sessions. `difference` is `a - b`. */
export function compareSessions(
  sessionA: string,
  eventsA: readonly IndexEvent[],
  sessionB: string,
  eventsB: readonly IndexEvent[],
): SessionComparison {
  const itemsA = new Set(groupByItem(eventsA).keys());
  const itemsB = new Set(groupByItem(eventsB).keys());

  const countsA = stageCounts(eventsA);
  const countsB = stageCounts(eventsB);
  const delta = (stage: PipelineStage): StageDelta => ({
    a: countsA[stage],
    b: countsB[stage],
    difference: countsA[stage] - countsB[stage],
  });
  const stage_deltas: Record<PipelineStage, StageDelta> = {
    retrieval: delta('retrieval'),
    filtering: delta('filtering'),
    generation: delta('generation'),
    sanitization: delta('sanitization'),
    submission: delta('submission'),
    deletion: delta('deletion'),
  };

  return {
    session_a: sessionA,
    session_b: sessionB,
    only_in_a: [...itemsA].filter((id) => !itemsB.has(id)).sort(byNumber),
    only_in_b: [...itemsB].filter((id) => !itemsA.has(id)).sort(byNumber),
    in_both: [...itemsA].filter((id) => itemsB.has(id)).sort(byNumber),
    stage_deltas,
    error_counts: {
      a: eventsA.filter(isErrorEvent).length,
      b: eventsB.filter(isErrorEvent).length,
    },
  };
}

// ─── Stage analysis ─────────────────────────────────────────────────

export interface StageAnalysis {
  session_id: string;
  total_events: number;
  retrieval: { count: number; items: number };
  filtering: { count: number; passed: number; skipped: number; reasons: Record<string, number> };
  generation: { count: number; success: number; failed: number };
  sanitization: { count: number; records_dropped: number };
  submission: { count: number; success: number; failed: number };
  deletion: { count: number };
  errors: { total_count: number; by_stage: Record<string, number> };
}

/** Per-stage outcome counts for one session. */
export function analyzeStages(sessionId: string, events: readonly IndexEvent[]): StageAnalysis {
  const analysis: StageAnalysis = {
    session_id: sessionId,
    total_events: events.length,
    retrieval: { count: 0, items: 0 },
    filtering: { count: 0, passed: 0, skipped: 0, reasons: {} },
    generation: { count: 0, success: 0, failed: 0 },
    sanitization: { count: 0, records_dropped: 0 },
    submission: { count: 0, success: 0, failed: 0 },
    deletion: { count: 0 },
    errors: { total_count: 0, by_stage: {} },
  };
  const retrievedItems = new Set<number>();

  for (const event of events) {
    const failed = isErrorEvent(event);
    if (failed) {
      analysis.errors.total_count++;
      analysis.errors.by_stage[event.stage] = (analysis.errors.by_stage[event.stage] ?? 0) + 1;
    }

    switch (event.stage) {
      case 'retrieval':
        analysis.retrieval.count++;
        if (event.item_id !== 0) retrievedItems.add(event.item_id);
        break;
      case 'filtering': {
        analysis.filtering.count++;
        if (readPayload(filteringPayloadSchema, event.payload).should_index) {
          analysis.filtering.passed++;
        } else {
          analysis.filtering.skipped++;
          const reason = skipReasonOf(event.payload) ?? 'Unknown';
          analysis.filtering.reasons[reason] = (analysis.filtering.reasons[reason] ?? 0) + 1;
        }
        break;
      }
      case 'generation':
        analysis.generation.count++;
        if (failed) analysis.generation.failed++;
        else analysis.generation.success++;
        break;
      case 'sanitization': {
        analysis.sanitization.count++;
        const p = readPayload(sanitizationPayloadSchema, event.payload);
        analysis.sanitization.records_dropped += p.dropped_count > 0
          ? p.dropped_count
          : Math.max(p.initial_count - p.final_count, 0);
        break;
      }
      case 'submission':
        analysis.submission.count++;
        if (failed || event.payload['success'] === false) analysis.submission.failed++;
        else analysis.submission.success++;
        break;
      case 'deletion':
        analysis.deletion.count++;
        break;
      case 'summary':
        break;
    }
  }

  analysis.retrieval.items = retrievedItems.size;
  return analysis;
}

// ─── Use cases ──────────────────────────────────────────────────────

export async function findMissingItems(
  store: EventReader,
  sessionId: string,
  expectedIds: readonly number[],
): Promise<AnalysisResult<MissingReport>> {
  const events = await store.findSessionEvents(sessionId);
  if (events.length === 0) return sessionNotFound(sessionId);
  return { found: true, data: findMissing(sessionId, events, expectedIds) };
}

/** Not found when the session has no events or none for this item. */
export async function getItemTimeline(
  store: EventReader,
  sessionId: string,
  itemId: number,
): Promise<AnalysisResult<ItemTimeline>> {
  const events = await store.findSessionEvents(sessionId);
  if (events.length === 0) return sessionNotFound(sessionId);
  if (!events.some((e) => e.item_id === itemId)) {
    return { found: false, session_id: sessionId, error: `No events found for item ${itemId} in session ${sessionId}` };
  }
  return { found: true, data: new ItemTimeline(sessionId, itemId, events) };
}

export async function compareSessionsById(
  store: EventReader,
  sessionA: string,
  sessionB: string,
): Promise<AnalysisResult<SessionComparison>> {
  const [eventsA, eventsB] = await Promise.all([
    store.findSessionEvents(sessionA),
    store.findSessionEvents(sessionB),
  ]);
  if (eventsA.length === 0) return sessionNotFound(sessionA);
  if (eventsB.length === 0) return sessionNotFound(sessionB);
  return { found: true, data: compareSessions(sessionA, eventsA, sessionB, eventsB) };
}

export async function analyzeSessionStages(
  store: EventReader,
  sessionId: string,
): Promise<AnalysisResult<StageAnalysis>> {
  const events = await store.findSessionEvents(sessionId);
  if (events.length === 0) return sessionNotFound(sessionId);
  return { found: true, data: analyzeStages(sessionId, events) };
}
