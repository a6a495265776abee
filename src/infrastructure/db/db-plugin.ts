import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventStore } from '../../application/ports.js';
import { createDbClient } from './client.js';
import { PostgresEventStore } from './postgres-event-store.js';

export interface DbPluginOptions {
  databaseUrl: string;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Decorates `fastify.store` with the Postgres-backed event store used by
 * the query routes. Closes the connection pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(opts.databaseUrl);

  fastify.decorate('store', new PostgresEventStore(db));

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'store',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.store` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    store: EventStore;
  }
}
