import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  changePassword,
  changePasswordSchema,
  createUser,
  createUserSchema,
  toPublicUser,
  usernameParamsSchema,
} from '../../application/index.js';
import { requireRole, sessionOf } from './auth-hooks.js';

/**
 * GET  /api/v1/users                      admin
 * POST /api/v1/users                      admin
 * PUT  /api/v1/users/:username/password   admin, or the user themself
 */
async function userRoutes(fastify: FastifyInstance): Promise<void> {
  const { users } = fastify.hub.stores;

  fastify.get(
    '/api/v1/users',
    { preHandler: requireRole('admin') },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send((await users.list()).map(toPublicUser));
    },
  );

  fastify.post<{ Body: unknown }>(
    '/api/v1/users',
    { preHandler: requireRole('admin') },
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = createUserSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid user', details: parsed.error.flatten() });
      }
      return reply.status(201).send(await createUser(users, parsed.data));
    },
  );

  fastify.put<{ Params: unknown; Body: unknown }>(
    '/api/v1/users/:username/password',
    { preHandler: requireRole('viewer') },
    async (request: FastifyRequest<{ Params: unknown; Body: unknown }>, reply: FastifyReply) => {
      const params = usernameParamsSchema.safeParse(request.params);
      const parsed = changePasswordSchema.safeParse(request.body);
      if (!params.success || !parsed.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Password must be at least 8 characters' });
      }

      await changePassword(users, sessionOf(request).principal, params.data.username, parsed.data.password);
      return reply.status(204).send();
    },
  );
}

export default fp(userRoutes, {
  name: 'user-routes',
  dependencies: ['hub'],
  fastify: '5.x',
});
