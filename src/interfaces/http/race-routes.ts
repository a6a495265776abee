import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { detectRaces, resolveRaceParams } from '../../application/race-report.js';
import { safeInt } from './params.js';

/**
 * Race report route.
 *
 * GET /api/v1/races — items touched by concurrent sessions, plus patterns.
 */
async function raceRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/races',
    async (
      request: FastifyRequest<{
        Querystring: {
          min_concurrent?: string;
          time_window?: string;
          limit?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const params = {
        min_concurrent: safeInt(q.min_concurrent),
        time_window: safeInt(q.time_window),
        limit: safeInt(q.limit),
      };

      if (resolveRaceParams(params) === null) {
        return reply
          .status(400)
          .send({ error: 'min_concurrent, time_window and limit must be integers' });
      }

      fastify.log.debug({ params }, 'Race report requested');

      const report = await detectRaces(fastify.store, params);
      return reply.status(200).send(report);
    },
  );
}

export default fp(raceRoutes, {
  name: 'race-routes',
  dependencies: ['store'],
  fastify: '5.x',
});
