import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { AnalysisResult } from '../../domain/index.js';
import { listSessions } from '../../application/query-sessions.js';
import { summarizeSession } from '../../application/session-aggregator.js';
import {
  analyzeSessionStages,
  compareSessionsById,
  findMissingItems,
  getItemTimeline,
} from '../../application/analyzer.js';
import { exportProblemsCsv } from '../../application/csv-export.js';
import { missingItemsBodySchema } from '../../application/request-schema.js';
import { isValidSessionId, safeInt } from './params.js';

type SessionParams = { Params: { session_id: string } };

function rejectSessionId(reply: FastifyReply, sessionId: string): FastifyReply | null {
  return isValidSessionId(sessionId) ? null : reply.status(400).send({ error: 'session_id is invalid' });
}

/** Sends `data` with 200, or the not-found result with 404. */
function sendResult<T>(reply: FastifyReply, result: AnalysisResult<T>): FastifyReply {
  if (!result.found) {
    return reply.status(404).send({ error: result.error, session_id: result.session_id });
  }
  return reply.status(200).send(result.data);
}

/**
 * Read-only session analysis routes.
 *
 * GET  /api/v1/sessions                                   — recent sessions
 * GET  /api/v1/sessions/compare?a=&b=                     — compare two sessions
 * GET  /api/v1/sessions/:session_id/summary               — status counts and timing
 * GET  /api/v1/sessions/:session_id/stages                — per-stage analysis
 * POST /api/v1/sessions/:session_id/missing               — expected vs observed items
 * GET  /api/v1/sessions/:session_id/items/:item_id/timeline
 * GET  /api/v1/sessions/:session_id/export.csv            — problematic items as CSV
 */
async function sessionRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /api/v1/sessions ─────────────────────────────────
  fastify.get(
    '/api/v1/sessions',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const limit = safeInt(request.query.limit);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      const result = await listSessions(fastify.store, { limit });
      return reply.status(200).send(result);
    },
  );

  // ── GET /api/v1/sessions/compare ─────────────────────────
  fastify.get(
    '/api/v1/sessions/compare',
    async (
      request: FastifyRequest<{ Querystring: { a?: string; b?: string } }>,
      reply: FastifyReply,
    ) => {
      const { a, b } = request.query;
      if (a === undefined || b === undefined) {
        return reply.status(400).send({ error: 'a and b are required' });
      }
      if (!isValidSessionId(a) || !isValidSessionId(b)) {
        return reply.status(400).send({ error: 'a and b must be valid session ids' });
      }

      return sendResult(reply, await compareSessionsById(fastify.store, a, b));
    },
  );

  // ── GET /api/v1/sessions/:session_id/summary ─────────────
  fastify.get(
    '/api/v1/sessions/:session_id/summary',
    async (request: FastifyRequest<SessionParams>, reply: FastifyReply) => {
      const { session_id } = request.params;
      const rejected = rejectSessionId(reply, session_id);
      if (rejected !== null) return rejected;

      return sendResult(reply, await summarizeSession(fastify.store, session_id));
    },
  );

  // ── GET /api/v1/sessions/:session_id/stages ──────────────
  fastify.get(
    '/api/v1/sessions/:session_id/stages',
    async (request: FastifyRequest<SessionParams>, reply: FastifyReply) => {
      const { session_id } = request.params;
      const rejected = rejectSessionId(reply, session_id);
      if (rejected !== null) return rejected;

      return sendResult(reply, await analyzeSessionStages(fastify.store, session_id));
    },
  );

  // ── POST /api/v1/sessions/:session_id/missing ────────────
  fastify.post(
    '/api/v1/sessions/:session_id/missing',
    async (
      request: FastifyRequest<SessionParams & { Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const rejected = rejectSessionId(reply, request.params.session_id);
      if (rejected !== null) return rejected;

      const parsed = missingItemsBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await findMissingItems(
        fastify.store,
        request.params.session_id,
        parsed.data.expected_ids,
      );
      return sendResult(reply, result);
    },
  );

  // ── GET /api/v1/sessions/:session_id/items/:item_id/timeline
  fastify.get(
    '/api/v1/sessions/:session_id/items/:item_id/timeline',
    async (
      request: FastifyRequest<{ Params: { session_id: string; item_id: string } }>,
      reply: FastifyReply,
    ) => {
      const rejected = rejectSessionId(reply, request.params.session_id);
      if (rejected !== null) return rejected;

      const itemId = safeInt(request.params.item_id);
      if (itemId === undefined || Number.isNaN(itemId) || itemId < 1) {
        return reply.status(400).send({ error: 'item_id must be a positive integer' });
      }

      return sendResult(reply, await getItemTimeline(fastify.store, request.params.session_id, itemId));
    },
  );

  // ── GET /api/v1/sessions/:session_id/export.csv ──────────
  fastify.get(
    '/api/v1/sessions/:session_id/export.csv',
    async (request: FastifyRequest<SessionParams>, reply: FastifyReply) => {
      const { session_id } = request.params;
      const rejected = rejectSessionId(reply, session_id);
      if (rejected !== null) return rejected;

      const result = await exportProblemsCsv(fastify.store, session_id);
      if (!result.found) {
        return reply.status(404).send({ error: result.error, session_id });
      }

      return reply
        .status(200)
        .type('text/csv; charset=utf-8')
        .header('content-disposition', `attachment; filename="problems-${session_id}.csv"`)
        .send(result.data);
    },
  );
}

export default fp(sessionRoutes, {
  name: 'session-routes',
  dependencies: ['store'],
  fastify: '5.x',
});
