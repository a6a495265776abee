export type {
  EventSink,
  CorrelationSink,
  TouchStore,
  EventReader,
  RetentionStore,
  EventStore,
  SessionListing,
  PurgeResult,
} from './ports.js';
export { startIngestionSession, createSessionId } from './ingestion-session.js';
export type { IngestionSession, IngestionSessionOptions } from './ingestion-session.js';
export { EventBuffer, deriveLevel, DEFAULT_BUFFER_THRESHOLD } from './event-buffer.js';
export type { EventBufferOptions } from './event-buffer.js';
export { RaceDetector, DEFAULT_RACE_WINDOW_SECONDS } from './race-detector.js';
export type { RaceDetectorOptions } from './race-detector.js';
export { buildSessionSummary, summarizeSession } from './session-aggregator.js';
export type { SessionSummary } from './session-aggregator.js';
export {
  findMissing,
  findMissingItems,
  ItemTimeline,
  getItemTimeline,
  compareSessions,
  compareSessionsById,
  analyzeStages,
  analyzeSessionStages,
} from './analyzer.js';
export type { MissingReport, SessionComparison, StageDelta, StageAnalysis } from './analyzer.js';
export { detectRaces, aggregateRaces, resolveRaceParams, DEFAULT_RACE_PARAMS } from './race-report.js';
export type { DetectRacesParams, ResolvedRaceParams, RaceItem, RaceReport } from './race-report.js';
export { renderProblemsCsv, exportProblemsCsv, CSV_HEADER } from './csv-export.js';
export { listSessions } from './query-sessions.js';
export type { ListSessionsParams } from './query-sessions.js';
export { purgeExpired, DEFAULT_RETENTION_DAYS } from './retention.js';
export { IndexingTelemetry, noopObserver } from './indexing-telemetry.js';
