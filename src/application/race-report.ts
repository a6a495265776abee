import type { CorrelationRecord, EventStage } from '../domain/index.js';
import { stageRank } from '../domain/index.js';
import type { EventReader } from './ports.js';

const DEFAULT_MIN_CONCURRENT = 2;
const DEFAULT_TIME_WINDOW = 10;
const MAX_TIME_WINDOW = 3600;
const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 500;

export interface DetectRacesParams {
  min_concurrent?: number | undefined;
  time_window?: number | undefined;
  limit?: number | undefined;
}

export interface ResolvedRaceParams {
  min_concurrent: number;
  time_window: number;
  limit: number;
}

export interface RaceItem {
  item_id: number;
  /** Correlation records for the item. */
  occurrence_count: number;
  /** Distinct sessions involved across those records. */
  concurrent_sessions: number;
  sessions: string[];
  stages: EventStage[];
  first_seen: string;
  last_seen: string;
}

export interface RaceReport {
  params: ResolvedRaceParams;
  total_items_affected: number;
  top_concurrent_items: RaceItem[];
  stage_patterns: Partial<Record<EventStage, number>>;
  /** Detections per UTC hour of day, keyed "00".."23". */
  hourly_patterns: Record<string, number>;
}

export const DEFAULT_RACE_PARAMS: ResolvedRaceParams = {
  min_concurrent: DEFAULT_MIN_CONCURRENT,
  time_window: DEFAULT_TIME_WINDOW,
  limit: DEFAULT_LIMIT,
};

function isInteger(value: number): boolean {
  return Number.isFinite(value) && value === Math.floor(value);
}

/**
 * Validates and clamps race query parameters.
 * Returns `null` if any supplied value is not an integer.
 *
 * min_concurrent >= 2, time_window in [1, 3600] seconds, limit in [1, 500].
 */
export function resolveRaceParams(params: DetectRacesParams): ResolvedRaceParams | null {
  const { min_concurrent, time_window, limit } = params;
  for (const v of [min_concurrent, time_window, limit]) {
    if (v !== undefined && !isInteger(v)) return null;
  }

  return {
    min_concurrent: Math.max(min_concurrent ?? DEFAULT_MIN_CONCURRENT, 2),
    time_window: Math.min(Math.max(time_window ?? DEFAULT_TIME_WINDOW, 1), MAX_TIME_WINDOW),
    limit: Math.min(Math.max(limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT),
  };
}

/**
 * Folds correlation records into one entry per item.
 *
 * An item qualifies when at least `min_concurrent` distinct sessions are
 * involved. Patterns cover every qualifying record, not only the items
 * kept by `limit`.
 */
export function aggregateRaces(
  records: readonly CorrelationRecord[],
  params: ResolvedRaceParams,
): RaceReport {
  const maxGapMs = params.time_window * 1000;
  const groups = new Map<number, { records: CorrelationRecord[]; sessions: Set<string>; stages: Set<EventStage> }>();

  for (const record of records) {
    if (record.gap_ms > maxGapMs) continue;
    let group = groups.get(record.item_id);
    if (group === undefined) {
      group = { records: [], sessions: new Set(), stages: new Set() };
      groups.set(record.item_id, group);
    }
    group.records.push(record);
    for (const s of record.sessions) group.sessions.add(s);
    for (const s of record.stages) group.stages.add(s);
  }

  const qualifying: RaceItem[] = [];
  const stage_patterns: Partial<Record<EventStage, number>> = {};
  const hourly_patterns: Record<string, number> = {};

  for (const [itemId, group] of groups) {
    if (group.sessions.size < params.min_concurrent) continue;

    const firsts = group.records.map((r) => Date.parse(r.first_seen));
    const lasts = group.records.map((r) => Date.parse(r.last_seen));
    qualifying.push({
      item_id: itemId,
      occurrence_count: group.records.length,
      concurrent_sessions: group.sessions.size,
      sessions: [...group.sessions].sort(),
      stages: [...group.stages].sort((a, b) => stageRank(a) - stageRank(b)),
      first_seen: new Date(Math.min(...firsts)).toISOString(),
      last_seen: new Date(Math.max(...lasts)).toISOString(),
    });

    for (const record of group.records) {
      stage_patterns[record.stage] = (stage_patterns[record.stage] ?? 0) + 1;
      const hour = String(new Date(record.last_seen).getUTCHours()).padStart(2, '0');
      hourly_patterns[hour] = (hourly_patterns[hour] ?? 0) + 1;
    }
  }

  qualifying.sort((a, b) => b.occurrence_count - a.occurrence_count || a.item_id - b.item_id);

  return {
    params,
    total_items_affected: qualifying.length,
    top_concurrent_items: qualifying.slice(0, params.limit),
    stage_patterns,
    hourly_patterns,
  };
}

/**
 * Use case: report items repeatedly touched by concurrent sessions.
 * Invalid parameters fall back to defaults; validate with
 * `resolveRaceParams` first to reject them.
 */
export async function detectRaces(store: EventReader, params: DetectRacesParams = {}): Promise<RaceReport> {
  const resolved = resolveRaceParams(params) ?? DEFAULT_RACE_PARAMS;
  const records = await store.findCorrelations(resolved.time_window * 1000);
  return aggregateRaces(records, resolved);
}
