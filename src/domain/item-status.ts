import type { IndexEvent } from './event.js';
import { isErrorEvent, isPipelineStage, stageRank } from './event.js';

/** Outcome of an item within a session. `unknown` is the only non-terminal state. */
export type FinalStatus = 'indexed' | 'skipped' | 'failed' | 'unknown';

export const FINAL_STATUSES: readonly FinalStatus[] = ['indexed', 'skipped', 'failed', 'unknown'];

export type StatusCounts = Record<FinalStatus, number>;

export function emptyStatusCounts(): StatusCounts {
  return { indexed: 0, skipped: 0, failed: 0, unknown: 0 };
}

/**
 * Per-item state for the latest attempt.
 *
 * `decidingRank` is the pipeline rank of the event that set `status`
 * (-1 while nothing conclusive has been seen).
 */
export interface ItemState {
  readonly status: FinalStatus;
  readonly decidingRank: number;
}

export const INITIAL_ITEM_STATE: ItemState = { status: 'unknown', decidingRank: -1 };

/** Stable chronological sort; events sharing a timestamp keep insertion order. */
export function sortChronologically(events: readonly IndexEvent[]): IndexEvent[] {
  return [...events].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

/** Status implied by a single event, ignoring everything else about the item. */
export function statusOfEvent(event: IndexEvent): FinalStatus {
  switch (event.stage) {
    case 'submission':
      return !isErrorEvent(event) && event.payload['success'] !== false ? 'indexed' : 'failed';
    case 'deletion':
      return 'skipped';
    case 'filtering':
      if (event.payload['should_index'] === false) return 'skipped';
      break;
    default:
      break;
  }
  return isErrorEvent(event) ? 'failed' : 'unknown';
}

/**
 * Advances an item's state by one event.
 *
 * Last-stage-wins: a conclusive event replaces the current status only if
 * it sits at the same or a later pipeline stage, so an error followed by a
 * successful submission reads as `indexed`. A retrieval restarts the
 * attempt; nothing else can take a terminal status back to `unknown`.
 */
export function nextItemState(state: ItemState, event: IndexEvent): ItemState {
  if (!isPipelineStage(event.stage)) return state;

  const current = event.stage === 'retrieval' ? INITIAL_ITEM_STATE : state;
  const status = statusOfEvent(event);
  if (status === 'unknown') return current;

  const rank = stageRank(event.stage);
  return rank >= current.decidingRank ? { status, decidingRank: rank } : current;
}

/** Derives an item's final status from all of its events in one session. */
export function deriveFinalStatus(itemEvents: readonly IndexEvent[]): FinalStatus {
  return sortChronologically(itemEvents).reduce(nextItemState, INITIAL_ITEM_STATE).status;
}

/** Groups item-level events (item_id !== 0) by item id, preserving order. */
export function groupByItem(events: readonly IndexEvent[]): Map<number, IndexEvent[]> {
  const items = new Map<number, IndexEvent[]>();
  for (const event of events) {
    if (event.item_id === 0) continue;
    const existing = items.get(event.item_id);
    if (existing === undefined) {
      items.set(event.item_id, [event]);
    } else {
      existing.push(event);
    }
  }
  return items;
}
