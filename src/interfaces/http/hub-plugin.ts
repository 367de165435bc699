import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Hub, DashboardSession } from '../../application/index.js';

export interface HubPluginOptions {
  hub: Hub;
}

/**
 * Decorates `fastify.hub` with the composed hub core and reserves
 * `request.session` for the dashboard principal.
 */
async function hubPlugin(fastify: FastifyInstance, opts: HubPluginOptions): Promise<void> {
  fastify.decorate('hub', opts.hub);
  fastify.decorateRequest('session', null);
}

export default fp(hubPlugin, {
  name: 'hub',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    hub: Hub;
  }
  interface FastifyRequest {
    session: DashboardSession | null;
  }
}
