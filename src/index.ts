import { buildApp } from './app.js';
import { loadConfig } from './infrastructure/config.js';

/**
 * Bootstrap the read-only query API.
 *
 * Order:
 * 1) Config
 * 2) Plugins and routes
 * 3) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const fastify = await buildApp({
    logger: { level: config.LOG_LEVEL },
    store: { kind: 'postgres', databaseUrl: config.DATABASE_URL },
  });

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: config.HOST,
    port: config.PORT,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
