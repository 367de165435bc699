import Fastify from 'fastify';
import { pino } from 'pino';

import { AuthFailureLimiter, hashSecret } from './application/index.js';
import { loadAgentConfig } from './infrastructure/index.js';
import {
  HubReporter,
  InstanceCatalog,
  runScript,
  SystemProbe,
  tailConsoleLogs,
} from './infrastructure/agent/index.js';
import { errorHandler } from './interfaces/http/index.js';
import { agentRoutes, LogStreamServer } from './interfaces/agent/index.js';
import type { AgentContext } from './interfaces/agent/index.js';

/**
 * Spoke agent bootstrap: `/status`, `/command/:instance/:verb` and the
 * `/logs` WebSocket, all behind the hub's API key.
 */
async function main(): Promise<void> {
  const config = loadAgentConfig();
  const log = pino({ level: config.logLevel });
  const fastify = Fastify({ loggerInstance: log });

  const apiKeyHash = config.apiKeyHash ?? (config.apiKey !== null ? await hashSecret(config.apiKey) : null);
  if (apiKeyHash === null) {
    throw new Error('No API key configured');
  }
  if (config.hubAllowedIp === null) {
    log.warn('HUB_ALLOWED_IP is unset; any address presenting the API key is accepted');
  }

  const catalog = new InstanceCatalog(config.gameRoot, config.instances);
  const host = new SystemProbe(config.gameRoot);

  const ctx: AgentContext = {
    credential: { api_key_hash: apiKeyHash, allowed_source_ip: config.hubAllowedIp },
    limiter: new AuthFailureLimiter({ maxFailures: 10, windowMs: 15 * 60_000, maxOrigins: 1_000 }),
    instances: catalog,
    host,
    run: (instance, action) => runScript(config.gameRoot, instance, action, config.scriptTimeoutMs),
    reporter:
      config.hub !== null && config.apiKey !== null
        ? new HubReporter({
          hubUrl: config.hub.url,
          spokeId: config.hub.spokeId,
          apiKey: config.apiKey,
          timeoutMs: config.callbackTimeoutMs,
          log: log.child({ component: 'hub-reporter' }),
        })
        : null,
    customActions: config.customActions,
    log,
  };

  if (ctx.reporter === null) {
    log.warn('HUB_URL/SPOKE_ID unset: command results are only logged, the hub will time them out');
  }

  await fastify.register(errorHandler);
  await fastify.register(agentRoutes, ctx);

  const logStream = new LogStreamServer(
    ctx,
    {
      follow: async (onLine, { replay }) => {
        const instances = await catalog.list();
        const files = instances.map((instance) => ({ instance, path: catalog.consoleLogPath(instance) }));
        const lines = replay ? config.logReplayLines : 0;
        return tailConsoleLogs(files, lines, onLine, log.child({ component: 'log-tail' }));
      },
    },
    log.child({ component: 'log-stream' }),
  );

  fastify.addHook('onClose', async () => {
    logStream.close();
  });

  await fastify.listen({ host: config.host, port: config.port });
  logStream.attach(fastify.server);
  log.info({ gameRoot: config.gameRoot, customActions: config.customActions }, 'Spoke agent ready');

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
  console.error('Fatal: failed to start spoke agent', err instanceof Error ? err.message : err);
  process.exit(1);
});
