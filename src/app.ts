import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import type { EventStore } from './application/ports.js';
import { dbPlugin } from './infrastructure/db/index.js';
import { storePlugin } from './infrastructure/memory/index.js';
import { sessionRoutes, raceRoutes, healthRoutes } from './interfaces/http/index.js';

export type StoreSource =
  | { kind: 'postgres'; databaseUrl: string }
  | { kind: 'provided'; store: EventStore };

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  store: StoreSource;
}

/**
 * Builds the query API without listening.
 *
 * Order:
 * 1) Store plugin (Postgres, or a store passed in)
 * 2) HTTP routes
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  if (options.store.kind === 'postgres') {
    await fastify.register(dbPlugin, { databaseUrl: options.store.databaseUrl });
  } else {
    await fastify.register(storePlugin, { store: options.store.store });
  }

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(healthRoutes);
  await fastify.register(sessionRoutes);
  await fastify.register(raceRoutes);

  return fastify;
}
