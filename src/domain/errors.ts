/**
 * Error taxonomy for the telemetry layer.
 *
 * None of these ever reach the indexing pipeline: ingestion boundaries
 * catch and log them. Missing analysis input is a result value, not an
 * error (see AnalysisResult).
 */

/** The store could not be reached or configured; telemetry is disabled. */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Event store unavailable: ${message}`, options);
    this.name = 'StoreUnavailableError';
  }
}

/** A buffered batch could not be written and was dropped. */
export class WriteFailedError extends Error {
  readonly batchSize: number;

  constructor(batchSize: number, options?: { cause?: unknown }) {
    super(`Failed to write batch of ${batchSize} events`, options);
    this.name = 'WriteFailedError';
    this.batchSize = batchSize;
  }
}

/**
 * Result of an analysis read. Sessions without events yield
 * `found: false` instead of throwing.
 */
export type AnalysisResult<T> =
  | { readonly found: true; readonly data: T }
  | { readonly found: false; readonly session_id: string; readonly error: string };

export function sessionNotFound(sessionId: string): AnalysisResult<never> {
  return { found: false, session_id: sessionId, error: `No events found for session ${sessionId}` };
}
