import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { transitionQuerySchema } from '../../application/index.js';
import { requireRole } from './auth-hooks.js';

/** GET /api/v1/transitions?spoke_id=&limit=&offset= newest first. */
async function transitionRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get<{ Querystring: unknown }>(
    '/api/v1/transitions',
    { preHandler: requireRole('viewer') },
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const query = transitionQuerySchema.safeParse(request.query);
      if (!query.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid query', details: query.error.flatten() });
      }

      const events = await fastify.hub.stores.transitions.list(query.data);
      return reply.status(200).send({
        data: events,
        pagination: { limit: query.data.limit, offset: query.data.offset, count: events.length },
      });
    },
  );
}

export default fp(transitionRoutes, {
  name: 'transition-routes',
  dependencies: ['hub'],
  fastify: '5.x',
});
