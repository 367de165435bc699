import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  getNotificationSettings,
  notificationSettingsSchema,
  updateNotificationSettings,
} from '../../application/index.js';
import { requireRole } from './auth-hooks.js';

/**
 * GET /api/v1/settings/notifications
 * PUT /api/v1/settings/notifications
 */
async function settingsRoutes(fastify: FastifyInstance): Promise<void> {
  const { settings } = fastify.hub.stores;

  fastify.get(
    '/api/v1/settings/notifications',
    { preHandler: requireRole('admin') },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(await getNotificationSettings(settings));
    },
  );

  fastify.put<{ Body: unknown }>(
    '/api/v1/settings/notifications',
    { preHandler: requireRole('admin') },
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = notificationSettingsSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid notification settings', details: parsed.error.flatten() });
      }
      return reply.status(200).send(await updateNotificationSettings(settings, parsed.data));
    },
  );
}

export default fp(settingsRoutes, {
  name: 'settings-routes',
  dependencies: ['hub'],
  fastify: '5.x',
});
