import type { AnalysisResult, IndexEvent } from '../domain/index.js';
import {
  deriveFinalStatus,
  groupByItem,
  isErrorEvent,
  isPipelineStage,
  sessionNotFound,
  sortChronologically,
} from '../domain/index.js';
import type { EventReader } from './ports.js';
import { filteringPayloadSchema, readPayload, skipReasonOf } from './payload-schema.js';

export const CSV_HEADER = 'item_id,type,final_status,skip_reason,error_count,last_stage';

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

function skipReason(events: readonly IndexEvent[]): string {
  let reason = '';
  for (const event of events) {
    if (event.stage === 'filtering' && !readPayload(filteringPayloadSchema, event.payload).should_index) {
      reason = skipReasonOf(event.payload) ?? reason;
    } else if (event.stage === 'deletion') {
      reason = skipReasonOf(event.payload) ?? reason;
    }
  }
  return reason;
}

/**
 * Renders one CSV row per problematic item (failed, skipped, or with at
 * least one error event), ordered by item id. Ends with a newline.
 */
export function renderProblemsCsv(events: readonly IndexEvent[]): string {
  const lines = [CSV_HEADER];
  const items = [...groupByItem(events)].sort(([a], [b]) => a - b);

  for (const [itemId, itemEvents] of items) {
    const sorted = sortChronologically(itemEvents);
    const status = deriveFinalStatus(sorted);
    const errorCount = sorted.filter(isErrorEvent).length;
    if (status !== 'failed' && status !== 'skipped' && errorCount === 0) continue;

    const type = sorted.find((e) => e.item_type !== undefined)?.item_type ?? '';
    const lastStage = sorted.filter((e) => isPipelineStage(e.stage)).at(-1)?.stage ?? 'unknown';

    lines.push([
      String(itemId),
      quote(type),
      quote(status),
      quote(skipReason(sorted)),
      String(errorCount),
      quote(lastStage),
    ].join(','));
  }

  return `${lines.join('\n')}\n`;
}

export async function exportProblemsCsv(store: EventReader, sessionId: string): Promise<AnalysisResult<string>> {
  const events = await store.findSessionEvents(sessionId);
  if (events.length === 0) return sessionNotFound(sessionId);
  return { found: true, data: renderProblemsCsv(events) };
}
