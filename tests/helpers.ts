import { randomUUID } from 'node:crypto';
import { vi } from 'vitest';
import pino from 'pino';
import type { IndexEvent } from '../src/domain/index.js';

export const BASE_MS = Date.parse('2026-03-02T10:00:00.000Z');

/** ISO timestamp `seconds` after BASE_MS. */
export function at(seconds: number): string {
  return new Date(BASE_MS + seconds * 1000).toISOString();
}

/** Silent pino logger with every level method spied. */
export function fakeLogger() {
  const log = pino({ level: 'silent' });
  vi.spyOn(log, 'info');
  vi.spyOn(log, 'debug');
  vi.spyOn(log, 'warn');
  vi.spyOn(log, 'error');
  return log;
}

/** Minimal IndexEvent factory. */
export function makeEvent(overrides: Partial<IndexEvent> = {}): IndexEvent {
  return {
    event_id: randomUUID(),
    session_id: 'sess-a',
    item_id: 1,
    stage: 'retrieval',
    level: 'info',
    timestamp: at(0),
    payload: {},
    ...overrides,
  };
}

/** Fixed UUID for records whose id a test compares. */
export function uuid(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}
