import { z } from 'zod';
import type { CorrelationRecord, IndexEvent } from '../../domain/index.js';
import { EVENT_LEVELS, EVENT_STAGES } from '../../domain/index.js';

export const STREAM_KEY = 'index_events_stream';

const stageSchema = z.enum(EVENT_STAGES);

const indexEventSchema = z.object({
  event_id: z.string().uuid(),
  session_id: z.string().min(1),
  item_id: z.number().int().nonnegative(),
  item_type: z.string().optional(),
  stage: stageSchema,
  level: z.enum(EVENT_LEVELS),
  timestamp: z.string().datetime(),
  payload: z.record(z.string(), z.unknown()),
});

const correlationSchema = z.object({
  event_id: z.string().uuid(),
  item_id: z.number().int().positive(),
  stage: stageSchema,
  session_id: z.string().min(1),
  sessions: z.array(z.string()),
  stages: z.array(stageSchema),
  first_seen: z.string().datetime(),
  last_seen: z.string().datetime(),
  occurrence_count: z.number().int().positive(),
  gap_ms: z.number().int().nonnegative(),
  detected_at: z.string().datetime(),
});

export type StreamEntry =
  | { kind: 'event'; event: IndexEvent }
  | { kind: 'correlation'; record: CorrelationRecord };

/**
 * Flat field/value list for XADD. Redis stream values are strings, so the
 * body travels as one JSON field.
 */
export function encodeEntry(entry: StreamEntry): string[] {
  return entry.kind === 'event'
    ? ['kind', 'event', 'data', JSON.stringify(entry.event)]
    : ['kind', 'correlation', 'data', JSON.stringify(entry.record)];
}

/**
 * Parses a raw stream entry ([field, value, field, value, ...]).
 * Returns null when the entry is malformed.
 */
export function decodeEntry(fields: readonly string[]): StreamEntry | null {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  let data: unknown;
  try {
    data = JSON.parse(map.get('data') ?? '');
  } catch {
    return null;
  }

  switch (map.get('kind')) {
    case 'event': {
      const parsed = indexEventSchema.safeParse(data);
      return parsed.success ? { kind: 'event', event: parsed.data } : null;
    }
    case 'correlation': {
      const parsed = correlationSchema.safeParse(data);
      return parsed.success ? { kind: 'correlation', record: parsed.data } : null;
    }
    default:
      return null;
  }
}
