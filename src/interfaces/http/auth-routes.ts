import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { loginSchema } from '../../application/index.js';
import { requireRole, sessionOf } from './auth-hooks.js';

/**
 * POST /api/v1/auth/login   exchange credentials for a bearer token
 * POST /api/v1/auth/logout  revoke the presented token
 */
async function authRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.post(
    '/api/v1/auth/login',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = loginSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid login request', details: parsed.error.flatten() });
      }

      const token = await fastify.hub.auth.login(parsed.data.username, parsed.data.password, request.ip);
      return reply.status(200).send(token);
    },
  );

  fastify.post(
    '/api/v1/auth/logout',
    { preHandler: requireRole('viewer') },
    async (request: FastifyRequest, reply: FastifyReply) => {
      fastify.hub.auth.logout(sessionOf(request));
      return reply.status(204).send();
    },
  );
}

export default fp(authRoutes, {
  name: 'auth-routes',
  dependencies: ['hub'],
  fastify: '5.x',
});
