import type { Logger } from 'pino';
import type { IndexingObserver, ItemState, SubmissionReport, FinalStatus } from '../domain/index.js';
import { BATCH_ITEM_ID, INITIAL_ITEM_STATE, emptyStatusCounts, nextItemState } from '../domain/index.js';
import type { EventBuffer } from './event-buffer.js';

/**
 * Observer that turns pipeline callbacks into telemetry events.
 *
 * Keeps a running per-item status so the closing summary can report a
 * breakdown without reading the store back.
 */
export class IndexingTelemetry implements IndexingObserver {
  private readonly itemStates = new Map<number, ItemState>();

  constructor(
    private readonly buffer: EventBuffer,
    private readonly log: Logger,
  ) {}

  get sessionId(): string {
    return this.buffer.sessionId;
  }

  private async record(...args: Parameters<EventBuffer['track']>): Promise<void> {
    try {
      const event = await this.buffer.track(...args);
      if (event.item_id !== BATCH_ITEM_ID) {
        const state = this.itemStates.get(event.item_id) ?? INITIAL_ITEM_STATE;
        this.itemStates.set(event.item_id, nextItemState(state, event));
      }
    } catch (err: unknown) {
      this.log.error({ err, item_id: args[0], stage: args[1] }, 'Failed to track telemetry event');
    }
  }

  async onItemRetrieved(itemId: number, data: Record<string, unknown> = {}): Promise<void> {
    await this.record(itemId, 'retrieval', data);
  }

  async onItemFiltered(itemId: number, shouldIndex: boolean, reason?: string): Promise<void> {
    const payload: Record<string, unknown> = { should_index: shouldIndex };
    if (reason !== undefined) payload['skip_reason'] = reason;
    await this.record(itemId, 'filtering', payload, 'debug');
  }

  async onRecordsGenerated(itemId: number, recordCount: number, error?: string): Promise<void> {
    const payload: Record<string, unknown> = { records_count: recordCount };
    if (error !== undefined) payload['error'] = error;
    await this.record(itemId, 'generation', payload);
  }

  async onRecordsSanitized(initialCount: number, finalCount: number, droppedIds: readonly string[]): Promise<void> {
    const dropped = Math.max(initialCount - finalCount, 0);
    await this.record(
      BATCH_ITEM_ID,
      'sanitization',
      {
        initial_count: initialCount,
        final_count: finalCount,
        dropped_count: dropped,
        dropped_ids: [...droppedIds],
      },
      dropped > 0 ? 'error' : 'info',
    );
  }

  async onRecordsSubmitted(report: SubmissionReport): Promise<void> {
    const payload: Record<string, unknown> = {
      records_count: report.recordCount,
      success: report.success,
    };
    if (report.taskId !== undefined) payload['task_id'] = report.taskId;
    if (report.error !== undefined) payload['error'] = report.error;
    const level = report.success ? 'info' : 'error';

    const itemIds = report.itemIds ?? [];
    if (itemIds.length === 0) {
      await this.record(BATCH_ITEM_ID, 'submission', payload, level);
      return;
    }
    for (const itemId of itemIds) {
      await this.record(itemId, 'submission', payload, level);
    }
  }

  async onItemDeleted(itemId: number, reason?: string): Promise<void> {
    const payload: Record<string, unknown> = {};
    if (reason !== undefined) payload['skip_reason'] = reason;
    await this.record(itemId, 'deletion', payload);
  }

  /**
   * Flushes pending events, then writes and flushes the closing `summary`
   * event carrying the session record.
   */
  async onSessionEnd(sessionId: string, durationSeconds: number, memoryPeak: number): Promise<void> {
    if (sessionId !== this.sessionId) {
      this.log.warn(
        { expected: this.sessionId, received: sessionId },
        'Session end reported for a different session id',
      );
    }

    await this.buffer.flush();

    const status_breakdown = emptyStatusCounts();
    for (const state of this.itemStates.values()) {
      status_breakdown[state.status]++;
    }

    await this.record(
      BATCH_ITEM_ID,
      'summary',
      {
        duration_seconds: durationSeconds,
        memory_peak: memoryPeak,
        total_items: this.itemStates.size,
        status_breakdown,
      },
      'stats',
    );
    await this.buffer.flush();

    this.log.info(
      { session_id: this.sessionId, total_items: this.itemStates.size, status_breakdown },
      'Indexing session closed',
    );
  }

  /** Running status of one item in this session. */
  statusOf(itemId: number): FinalStatus {
    return (this.itemStates.get(itemId) ?? INITIAL_ITEM_STATE).status;
  }
}

/** Observer used when the store is unavailable: every call is a no-op. */
export const noopObserver: IndexingObserver = {
  async onItemRetrieved() {},
  async onItemFiltered() {},
  async onRecordsGenerated() {},
  async onRecordsSanitized() {},
  async onRecordsSubmitted() {},
  async onItemDeleted() {},
  async onSessionEnd() {},
};
