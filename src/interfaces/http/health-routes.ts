import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';

/**
 * GET /api/v1/health — 200 when the store answers a trivial read, else 503.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/api/v1/health', async (_request, reply: FastifyReply) => {
    try {
      await fastify.store.listSessions(1);
      return reply.status(200).send({ status: 'ok' });
    } catch (err: unknown) {
      fastify.log.error({ err }, 'Health check failed');
      return reply.status(503).send({ status: 'unavailable' });
    }
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['store'],
  fastify: '5.x',
});
