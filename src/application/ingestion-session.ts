import { randomUUID } from 'node:crypto';

/**
 * One indexing run, owned by whatever process drives it.
 *
 * Replaces module-level session state: the buffer and detector receive
 * the session explicitly. `now()` never goes backwards for a given
 * session, even if the wall clock does.
 */
export interface IngestionSession {
  readonly session_id: string;
  readonly started_at: string;
  now(): string;
}

export interface IngestionSessionOptions {
  sessionId?: string;
  /** Clock function, injectable for tests. */
  nowFn?: () => number;
}

export function createSessionId(): string {
  return `idx_${randomUUID()}`;
}

export function startIngestionSession(options: IngestionSessionOptions = {}): IngestionSession {
  const nowFn = options.nowFn ?? Date.now;
  let last = nowFn();
  const startedAt = new Date(last).toISOString();

  return {
    session_id: options.sessionId ?? createSessionId(),
    started_at: startedAt,
    now(): string {
      last = Math.max(last, nowFn());
      return new Date(last).toISOString();
    },
  };
}
