import type { EventReader, SessionListing } from './ports.js';

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;

export interface ListSessionsParams {
  limit?: number | undefined;
}

/**
 * Use case: list the most recent sessions, newest first.
 * Clamps limit to [1, 100], defaults to 10.
 */
export async function listSessions(
  store: EventReader,
  params: ListSessionsParams,
): Promise<{ data: SessionListing[]; pagination: { limit: number; count: number } }> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);

  const data = await store.listSessions(limit);

  return {
    data,
    pagination: { limit, count: data.length },
  };
}
