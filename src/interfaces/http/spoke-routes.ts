import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { toPublicSpoke } from '../../domain/index.js';
import { heartbeatQuerySchema, registerSpokeSchema, spokeParamsSchema } from '../../application/index.js';
import { requireRole } from './auth-hooks.js';

/**
 * GET    /api/v1/spokes                          list (registration order)
 * POST   /api/v1/spokes                          register or re-register
 * GET    /api/v1/spokes/:spoke_id                single spoke
 * DELETE /api/v1/spokes/:spoke_id                remove and cancel everything it owns
 * GET    /api/v1/spokes/:spoke_id/heartbeats     recent heartbeat samples
 */
async function spokeRoutes(fastify: FastifyInstance): Promise<void> {
  const { registry, monitor } = fastify.hub;

  fastify.get(
    '/api/v1/spokes',
    { preHandler: requireRole('viewer') },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(registry.list().map(toPublicSpoke));
    },
  );

  fastify.post<{ Body: unknown }>(
    '/api/v1/spokes',
    { preHandler: requireRole('admin') },
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = registerSpokeSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid spoke registration', details: parsed.error.flatten() });
      }

      const { spoke, created } = await registry.register(parsed.data);
      return reply.status(created ? 201 : 200).send(toPublicSpoke(spoke));
    },
  );

  fastify.get<{ Params: unknown }>(
    '/api/v1/spokes/:spoke_id',
    { preHandler: requireRole('viewer') },
    async (request: FastifyRequest<{ Params: unknown }>, reply: FastifyReply) => {
      const params = spokeParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'spoke_id must be a valid UUID' });
      }
      return reply.status(200).send(toPublicSpoke(registry.get(params.data.spoke_id)));
    },
  );

  fastify.delete<{ Params: unknown }>(
    '/api/v1/spokes/:spoke_id',
    { preHandler: requireRole('admin') },
    async (request: FastifyRequest<{ Params: unknown }>, reply: FastifyReply) => {
      const params = spokeParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'spoke_id must be a valid UUID' });
      }
      await registry.remove(params.data.spoke_id);
      return reply.status(204).send();
    },
  );

  fastify.get<{ Params: unknown; Querystring: unknown }>(
    '/api/v1/spokes/:spoke_id/heartbeats',
    { preHandler: requireRole('viewer') },
    async (request: FastifyRequest<{ Params: unknown; Querystring: unknown }>, reply: FastifyReply) => {
      const params = spokeParamsSchema.safeParse(request.params);
      const query = heartbeatQuerySchema.safeParse(request.query);
      if (!params.success || !query.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid spoke_id or limit' });
      }

      registry.get(params.data.spoke_id);
      const samples = monitor.recentSamples(params.data.spoke_id).slice(-query.data.limit);
      return reply.status(200).send(samples);
    },
  );
}

export default fp(spokeRoutes, {
  name: 'spoke-routes',
  dependencies: ['hub'],
  fastify: '5.x',
});
