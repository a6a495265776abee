import type { Logger } from 'pino';
import type { IndexEvent, CorrelationRecord } from '../domain/index.js';
import { BATCH_ITEM_ID, correlateTouches } from '../domain/index.js';
import type { CorrelationSink, TouchStore } from './ports.js';

export const DEFAULT_RACE_WINDOW_SECONDS = 10;

export interface RaceDetectorOptions {
  windowSeconds?: number;
  /** Clock for `detected_at`, injectable for tests. */
  nowFn?: () => Date;
}

/**
 * Flags items touched by more than one session within a trailing window.
 *
 * Every checked event is recorded as a touch, whether or not it
 * correlated. Store failures are logged and never surface to the caller.
 */
export class RaceDetector {
  private readonly windowMs: number;
  private readonly nowFn: () => Date;

  constructor(
    private readonly touches: TouchStore,
    private readonly correlations: CorrelationSink,
    private readonly log: Logger,
    options: RaceDetectorOptions = {},
  ) {
    this.windowMs = (options.windowSeconds ?? DEFAULT_RACE_WINDOW_SECONDS) * 1000;
    this.nowFn = options.nowFn ?? (() => new Date());
  }

  async check(event: IndexEvent): Promise<CorrelationRecord | null> {
    if (event.item_id === BATCH_ITEM_ID || event.stage === 'summary') return null;

    const touch = {
      item_id: event.item_id,
      session_id: event.session_id,
      stage: event.stage,
      timestamp: event.timestamp,
    };

    let record: CorrelationRecord | null = null;
    try {
      const until = Date.parse(event.timestamp);
      const since = new Date(until - this.windowMs).toISOString();
      const recent = await this.touches.findRecentTouches(event.item_id, since, event.timestamp);

      record = correlateTouches(event.event_id, touch, recent, this.windowMs, this.nowFn().toISOString());
      if (record !== null) {
        this.log.warn(
          { item_id: record.item_id, sessions: record.sessions, stages: record.stages, gap_ms: record.gap_ms },
          `Possible race on item ${record.item_id}`,
        );
        await this.correlations.insertCorrelation(record);
      }
    } catch (err: unknown) {
      this.log.error({ err, item_id: event.item_id }, 'Race check failed');
    }

    try {
      await this.touches.recordTouch(touch);
    } catch (err: unknown) {
      this.log.error({ err, item_id: event.item_id }, 'Failed to record item touch');
    }

    return record;
  }
}
