import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from 'pino';
import { COMMAND_VERBS, ControlPlaneError } from '../../domain/index.js';
import type { SpokeMetrics } from '../../domain/index.js';
import { normalizeIp, verifySpokeCredential } from '../../application/index.js';
import type { AuthFailureLimiter, SpokeCredential } from '../../application/index.js';
import type { ScriptOutcome } from '../../infrastructure/agent/index.js';
import { headerValue } from '../http/auth-hooks.js';

export interface AgentHostProbe {
  metrics(): Promise<SpokeMetrics>;
  sessions(): Promise<string[]>;
}

export interface AgentInstances {
  has(instance: string): Promise<boolean>;
}

export type CommandRunner = (instance: string, action: string) => Promise<ScriptOutcome>;

export interface ResultReporter {
  report(commandId: string, outcome: ScriptOutcome): Promise<boolean>;
}

export interface AgentContext {
  credential: SpokeCredential;
  limiter: AuthFailureLimiter;
  instances: AgentInstances;
  host: AgentHostProbe;
  run: CommandRunner;
  reporter: ResultReporter | null;
  customActions: readonly string[];
  log: Logger;
}

const commandParamsSchema = z.object({
  instance: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/),
  verb: z.enum(COMMAND_VERBS),
});

const commandBodySchema = z.object({
  command_id: z.string().uuid(),
  action: z.string().min(1).max(32).optional(),
});

/**
 * Checks the hub's X-API-KEY and source IP. Failures count against the
 * caller's address; a throttled address is refused before any hashing.
 */
export async function authenticateHub(ctx: AgentContext, apiKey: string | undefined, sourceIp: string): Promise<void> {
  const origin = normalizeIp(sourceIp);
  if (ctx.limiter.isBlocked(origin)) {
    throw new ControlPlaneError('RateLimited', 'Too many failed authentication attempts; try again later');
  }

  const verdict = await verifySpokeCredential(ctx.credential, apiKey, origin);
  if (verdict === 'ok') return;

  const failures = ctx.limiter.recordFailure(origin);
  ctx.log.warn({ origin, verdict, failures }, 'Rejected hub call');
  if (verdict === 'forbidden_source_ip') {
    throw new ControlPlaneError('ForbiddenSourceIP', `Source IP ${origin} is not allowed`);
  }
  throw new ControlPlaneError('Unauthorized', 'Invalid API key');
}

/**
 * GET  /status                    tmux sessions and host metrics
 * POST /command/:instance/:verb   acknowledge, run `./<instance> <action>`, report back
 */
async function agentRoutes(fastify: FastifyInstance, ctx: AgentContext): Promise<void> {
  const running: Map<string, string> = new Map();

  fastify.addHook('onRequest', async (request: FastifyRequest) => {
    await authenticateHub(ctx, headerValue(request.headers['x-api-key']), request.ip);
  });

  fastify.get('/status', async (_request: FastifyRequest, reply: FastifyReply) => {
    let metrics: SpokeMetrics | null = null;
    try {
      metrics = await ctx.host.metrics();
    } catch (err: unknown) {
      ctx.log.warn({ err }, 'Failed to read host metrics');
    }
    const sessions = await ctx.host.sessions();
    return reply.status(200).send({ status: 'online', sessions, metrics });
  });

  fastify.post(
    '/command/:instance/:verb',
    async (request: FastifyRequest<{ Params: unknown; Body: unknown }>, reply: FastifyReply) => {
      const params = commandParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Invalid instance or verb' });
      }
      const body = commandBodySchema.safeParse(request.body);
      if (!body.success) {
        return reply.status(400).send({ error: 'ValidationError', message: 'Body needs a command_id', details: body.error.flatten() });
      }

      const { instance, verb } = params.data;
      const action = verb === 'custom' ? body.data.action : verb;
      if (action === undefined || (verb === 'custom' && !ctx.customActions.includes(action))) {
        return reply.status(400).send({ error: 'ValidationError', message: `Action ${action ?? '(none)'} is not allowed` });
      }

      if (!(await ctx.instances.has(instance))) {
        throw new ControlPlaneError('NotFound', `Instance ${instance} not found`);
      }
      const busyWith = running.get(instance);
      if (busyWith !== undefined) {
        throw new ControlPlaneError('Conflict', `Instance ${instance} is still running command ${busyWith}`);
      }

      const commandId = body.data.command_id;
      running.set(instance, commandId);
      ctx.log.info({ command_id: commandId, instance, action }, 'Command accepted');

      void execute(ctx, commandId, instance, action)
        .catch((err: unknown) => {
          ctx.log.error({ err, command_id: commandId }, 'Command execution crashed');
        })
        .finally(() => running.delete(instance));

      return reply.status(202).send({
        command_id: commandId,
        instance,
        action,
        message: `Command '${action}' triggered for ${instance}`,
      });
    },
  );
}

async function execute(ctx: AgentContext, commandId: string, instance: string, action: string): Promise<void> {
  const outcome = await ctx.run(instance, action);
  ctx.log.info(
    { command_id: commandId, instance, action, succeeded: outcome.succeeded, exit_code: outcome.exit_code },
    'Command finished',
  );
  if (ctx.reporter !== null) {
    await ctx.reporter.report(commandId, outcome);
  }
}

export default fp(agentRoutes, {
  name: 'agent-routes',
  fastify: '5.x',
});
