/**
 * Core domain types for the indexing telemetry model.
 *
 * An event is one observation of one item passing one pipeline stage.
 * These types carry no framework dependencies.
 */

/** Pipeline stages in their semantic order. The store does not enforce it. */
export const PIPELINE_STAGES = [
  'retrieval',
  'filtering',
  'generation',
  'sanitization',
  'submission',
  'deletion',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

/** `summary` closes a session; it is not a pipeline stage. */
export type EventStage = PipelineStage | 'summary';

export const EVENT_STAGES = [...PIPELINE_STAGES, 'summary'] as const;

export const EVENT_LEVELS = ['info', 'debug', 'error', 'warning', 'stats'] as const;

export type EventLevel = (typeof EVENT_LEVELS)[number];

/** Stages after which an item counts as processed. */
export const TERMINAL_STAGES: ReadonlySet<PipelineStage> = new Set(['submission', 'deletion']);

/** Item id reserved for batch-level events. */
export const BATCH_ITEM_ID = 0;

/** Free-form, stage-specific data attached to an event. */
export type EventPayload = Record<string, unknown>;

/**
 * Canonical telemetry event.
 *
 * `(session_id, item_id, stage)` is not unique: an item may revisit a
 * stage, so readers always aggregate.
 */
export interface IndexEvent {
  /** Assigned when the event is tracked; stores ignore a second write of the same id. */
  readonly event_id: string;
  readonly session_id: string;
  readonly item_id: number;
  readonly item_type?: string | undefined;
  readonly stage: EventStage;
  readonly level: EventLevel;
  readonly timestamp: string; // ISO-8601
  readonly payload: EventPayload;
}

const PIPELINE_STAGE_SET: ReadonlySet<string> = new Set(PIPELINE_STAGES);
const EVENT_STAGE_SET: ReadonlySet<string> = new Set(EVENT_STAGES);
const EVENT_LEVEL_SET: ReadonlySet<string> = new Set(EVENT_LEVELS);

export function isPipelineStage(value: string): value is PipelineStage {
  return PIPELINE_STAGE_SET.has(value);
}

export function isEventStage(value: string): value is EventStage {
  return EVENT_STAGE_SET.has(value);
}

export function isEventLevel(value: string): value is EventLevel {
  return EVENT_LEVEL_SET.has(value);
}

/** Position of a stage in pipeline order; `summary` sorts after everything. */
export function stageRank(stage: EventStage): number {
  return stage === 'summary' ? PIPELINE_STAGES.length : PIPELINE_STAGES.indexOf(stage);
}

/** True when the event reports a failure, by level or by payload. */
export function isErrorEvent(event: IndexEvent): boolean {
  const error = event.payload['error'];
  return event.level === 'error' || (typeof error === 'string' && error !== '');
}
