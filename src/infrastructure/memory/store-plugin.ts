import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventStore } from '../../application/ports.js';

export interface StorePluginOptions {
  store: EventStore;
}

/**
 * Decorates `fastify.store` with a store built elsewhere, such as an
 * in-memory one. Registers under the same name as the database plugin.
 */
async function storePlugin(fastify: FastifyInstance, opts: StorePluginOptions): Promise<void> {
  fastify.decorate('store', opts.store);
}

export default fp(storePlugin, {
  name: 'store',
  fastify: '5.x',
});
