import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { SpokeStatus } from '../../domain/index.js';

/** GET /api/v1/health liveness plus a fleet status tally. Public. */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/api/v1/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const fleet: Record<SpokeStatus, number> = { pending: 0, online: 0, degraded: 0, offline: 0 };
    for (const spoke of fastify.hub.registry.list()) {
      fleet[spoke.status]++;
    }

    return reply.status(200).send({
      status: 'ok',
      uptime_seconds: Math.floor(process.uptime()),
      fleet,
      log_relay: fastify.hub.relay.stats(),
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['hub'],
  fastify: '5.x',
});
