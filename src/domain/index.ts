export type { IndexEvent, EventPayload, EventStage, EventLevel, PipelineStage } from './event.js';
export {
  PIPELINE_STAGES,
  EVENT_STAGES,
  EVENT_LEVELS,
  TERMINAL_STAGES,
  BATCH_ITEM_ID,
  isPipelineStage,
  isEventStage,
  isEventLevel,
  stageRank,
  isErrorEvent,
} from './event.js';
export type { FinalStatus, StatusCounts, ItemState } from './item-status.js';
export {
  FINAL_STATUSES,
  INITIAL_ITEM_STATE,
  emptyStatusCounts,
  sortChronologically,
  statusOfEvent,
  nextItemState,
  deriveFinalStatus,
  groupByItem,
} from './item-status.js';
export type { ItemTouch, CorrelationRecord } from './race.js';
export { correlateTouches } from './race.js';
export type { AnalysisResult } from './errors.js';
export { StoreUnavailableError, WriteFailedError, sessionNotFound } from './errors.js';
export type { IndexingObserver, SubmissionReport } from './observer.js';
