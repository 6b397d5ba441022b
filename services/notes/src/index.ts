import { config } from './config';
import { closeDynamo } from './dynamo/client';
import { closeRedis } from './redis/client';
import { buildApp } from './server';

/**
 * Main entrypoint for the notes service.
 * Builds the Fastify app with the configured store and listens on configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  app.addHook('onClose', async () => {
    closeDynamo();
    await closeRedis();
  });

  if (!config.notes.tableName) {
    app.log.warn('NOTES_TABLE_NAME is not set; every notes request will fail with 500');
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Notes API (${config.store.backend}) listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }

  const shutdown = (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (err) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting notes API:', err);
  process.exit(1);
});
