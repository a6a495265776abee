import { z } from 'zod';

/** Body of POST /api/v1/sessions/:session_id/missing. */
export const missingItemsBodySchema = z.object({
  expected_ids: z.array(z.number().int().positive()).max(100_000),
});

export type MissingItemsBody = z.infer<typeof missingItemsBodySchema>;
