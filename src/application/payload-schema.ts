import { z } from 'zod';
import type { EventPayload } from '../domain/index.js';

/**
 * Lenient readers for stage payloads.
 *
 * Payloads come from the pipeline unvalidated, so every field falls back
 * to a default when missing or ill-typed. Parsing a payload never throws.
 */

const optionalString = z.string().optional().catch(undefined);
const count = z.number().int().nonnegative().catch(0);

export const filteringPayloadSchema = z.object({
  should_index: z.boolean().catch(true),
  skip_reason: optionalString,
  reason: optionalString,
});

export const generationPayloadSchema = z.object({
  records_count: count,
  error: optionalString,
});

export const sanitizationPayloadSchema = z.object({
  initial_count: count,
  final_count: count,
  dropped_count: count,
  dropped_ids: z.array(z.string()).catch([]),
});

export const submissionPayloadSchema = z.object({
  records_count: count,
  success: z.boolean().catch(true),
  task_id: z.union([z.string(), z.number()]).optional().catch(undefined),
  error: optionalString,
});

export const summaryPayloadSchema = z.object({
  duration_seconds: z.number().nonnegative().nullable().catch(null),
  memory_peak: z.number().nonnegative().nullable().catch(null),
});

export type FilteringPayload = z.infer<typeof filteringPayloadSchema>;
export type SanitizationPayload = z.infer<typeof sanitizationPayloadSchema>;
export type SummaryPayload = z.infer<typeof summaryPayloadSchema>;

/** Parses `payload` with `schema`, falling back to all-default fields. */
export function readPayload<T extends z.ZodTypeAny>(schema: T, payload: EventPayload): z.infer<T> {
  const result = schema.safeParse(payload);
  return result.success ? result.data : schema.parse({});
}

/** Skip reason recorded at filtering; older writers used `reason`. */
export function skipReasonOf(payload: EventPayload): string | undefined {
  const parsed = readPayload(filteringPayloadSchema, payload);
  return parsed.skip_reason ?? parsed.reason;
}
