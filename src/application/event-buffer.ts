import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { IndexEvent, EventLevel, EventPayload, EventStage } from '../domain/index.js';
import { WriteFailedError } from '../domain/index.js';
import type { EventSink } from './ports.js';
import type { IngestionSession } from './ingestion-session.js';
import type { RaceDetector } from './race-detector.js';

export const DEFAULT_BUFFER_THRESHOLD = 50;

export interface EventBufferOptions {
  sink: EventSink;
  session: IngestionSession;
  log: Logger;
  /** Omit to disable race detection. */
  detector?: RaceDetector | null | undefined;
  threshold?: number | undefined;
}

/** `error` when the payload carries a non-empty error string, else `info`. */
export function deriveLevel(payload: EventPayload): EventLevel {
  const error = payload['error'];
  return typeof error === 'string' && error !== '' ? 'error' : 'info';
}

/**
 * Ordered in-memory queue in front of an event sink.
 *
 * Delivery is at-most-once: a batch that fails to write is logged and
 * dropped. Neither `track` nor `flush` rejects.
 */
export class EventBuffer {
  private queue: IndexEvent[] = [];
  private readonly sink: EventSink;
  private readonly session: IngestionSession;
  private readonly log: Logger;
  private readonly detector: RaceDetector | null;
  readonly threshold: number;

  constructor(options: EventBufferOptions) {
    this.sink = options.sink;
    this.session = options.session;
    this.log = options.log;
    this.detector = options.detector ?? null;
    this.threshold = Math.max(options.threshold ?? DEFAULT_BUFFER_THRESHOLD, 1);
  }

  get sessionId(): string {
    return this.session.session_id;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Records one observation. Runs race detection first, then queues the
   * event and flushes once the queue reaches the threshold. The payload is
   * copied, so later changes by the caller are not written.
   *
   * Resolves to the queued event.
   */
  async track(
    itemId: number,
    stage: EventStage,
    payload: EventPayload = {},
    level?: EventLevel,
  ): Promise<IndexEvent> {
    const type = payload['type'];
    const event: IndexEvent = {
      event_id: randomUUID(),
      session_id: this.session.session_id,
      item_id: itemId,
      item_type: typeof type === 'string' ? type : undefined,
      stage,
      level: level ?? deriveLevel(payload),
      timestamp: this.session.now(),
      payload: { ...payload },
    };

    if (this.detector !== null) {
      await this.detector.check(event);
    }

    this.queue.push(event);

    if (this.queue.length >= this.threshold) {
      await this.flush();
    }

    return event;
  }

  /** Writes all queued events as one batch. Resolves to the number written. */
  async flush(): Promise<number> {
    if (this.queue.length === 0) return 0;

    const batch = this.queue;
    this.queue = [];

    try {
      await this.sink.writeBatch(batch);
      this.log.debug({ session_id: this.session.session_id, count: batch.length }, 'Telemetry batch flushed');
      return batch.length;
    } catch (cause: unknown) {
      const err = new WriteFailedError(batch.length, { cause });
      this.log.error({ err, session_id: this.session.session_id }, 'Telemetry batch dropped');
      return 0;
    }
  }
}
