import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  commandParamsSchema,
  commandResultParamsSchema,
  commandResultSchema,
  issueCommandSchema,
  listCommandsQuerySchema,
  spokeParamsSchema,
} from '../../application/index.js';
import { headerValue, requireRole, sessionOf } from './auth-hooks.js';

/**
 * POST /api/v1/spokes/:spoke_id/commands                       issue (verb policy applies)
 * GET  /api/v1/spokes/:spoke_id/commands                       history, newest first
 * GET  /api/v1/commands/:command_id                            single command
 * POST /api/v1/spokes/:spoke_id/commands/:command_id/result    completion report (spoke key)
 */
async function commandRoutes(fastify: FastifyInstance): Promise<void> {
  const { dispatcher, registry, auth } = fastify.hub;

  fastify.post<{ Params: unknown; Body: unknown }>(
    '/api/v1/spokes/:spoke_id/commands',
    { preHandler: requireRole('viewer') },
    async (request: FastifyRequest<{ Params: unknown; Body: unknown }>, reply: FastifyReply) => {
      const params = spokeParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'spoke_id must be a valid UUID' });
      }
      const parsed = issueCommandSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid command', details: parsed.error.flatten() });
      }

      const command = await dispatcher.dispatch({
        spokeId: params.data.spoke_id,
        verb: parsed.data.verb,
        targetInstance: parsed.data.target_instance,
        action: parsed.data.action,
        issuer: sessionOf(request).principal,
      });
      return reply.status(202).send(command);
    },
  );

  fastify.get<{ Params: unknown; Querystring: unknown }>(
    '/api/v1/spokes/:spoke_id/commands',
    { preHandler: requireRole('viewer') },
    async (request: FastifyRequest<{ Params: unknown; Querystring: unknown }>, reply: FastifyReply) => {
      const params = spokeParamsSchema.safeParse(request.params);
      const query = listCommandsQuerySchema.safeParse(request.query);
      if (!params.success || !query.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid spoke_id or limit' });
      }
      registry.get(params.data.spoke_id);
      return reply.status(200).send(await dispatcher.listForSpoke(params.data.spoke_id, query.data.limit));
    },
  );

  fastify.get<{ Params: unknown }>(
    '/api/v1/commands/:command_id',
    { preHandler: requireRole('viewer') },
    async (request: FastifyRequest<{ Params: unknown }>, reply: FastifyReply) => {
      const params = commandParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'command_id must be a valid UUID' });
      }
      return reply.status(200).send(await dispatcher.get(params.data.command_id));
    },
  );

  fastify.post(
    '/api/v1/spokes/:spoke_id/commands/:command_id/result',
    async (request: FastifyRequest<{ Params: unknown; Body: unknown }>, reply: FastifyReply) => {
      const params = commandResultParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'spoke_id and command_id must be valid UUIDs' });
      }

      await auth.authenticateSpokeCall(headerValue(request.headers['x-api-key']), request.ip, params.data.spoke_id);

      const parsed = commandResultSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid command result', details: parsed.error.flatten() });
      }

      const command = await dispatcher.reportResult(params.data.spoke_id, params.data.command_id, {
        succeeded: parsed.data.succeeded,
        detail: parsed.data.detail,
      });
      return reply.status(200).send(command);
    },
  );
}

export default fp(commandRoutes, {
  name: 'command-routes',
  dependencies: ['hub'],
  fastify: '5.x',
});
