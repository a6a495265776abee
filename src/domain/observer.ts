/**
 * Extension points an indexing pipeline calls while it runs.
 *
 * The pipeline receives an optional observer at construction and invokes
 * it at each stage; implementations must never throw or reject.
 */
export interface SubmissionReport {
  readonly recordCount: number;
  readonly success: boolean;
  readonly taskId?: string | number | undefined;
  readonly error?: string | undefined;
  /** Items whose records were in the submitted batch, when known. */
  readonly itemIds?: readonly number[] | undefined;
}

export interface IndexingObserver {
  onItemRetrieved(itemId: number, data?: Record<string, unknown>): Promise<void>;
  onItemFiltered(itemId: number, shouldIndex: boolean, reason?: string): Promise<void>;
  onRecordsGenerated(itemId: number, recordCount: number, error?: string): Promise<void>;
  onRecordsSanitized(initialCount: number, finalCount: number, droppedIds: readonly string[]): Promise<void>;
  onRecordsSubmitted(report: SubmissionReport): Promise<void>;
  onItemDeleted(itemId: number, reason?: string): Promise<void>;
  onSessionEnd(sessionId: string, durationSeconds: number, memoryPeak: number): Promise<void>;
}
