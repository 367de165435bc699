import { pino } from 'pino';

import { loadHubConfig } from './infrastructure/index.js';
import { buildHubServer } from './server.js';

/**
 * Hub bootstrap.
 *
 * Order:
 * 1) Config + logger
 * 2) Server with storage, messaging and notifications wired
 * 3) Hub core start (hydrate, first polls)
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadHubConfig();
  const log = pino({ level: config.logLevel });

  const { fastify, hub } = await buildHubServer(config, log);

  await hub.start();
  await fastify.listen({ host: config.host, port: config.port });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start hub', err instanceof Error ? err.message : err);
  process.exit(1);
});
