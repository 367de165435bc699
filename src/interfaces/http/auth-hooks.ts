import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { ControlPlaneError } from '../../domain/index.js';
import type { Role } from '../../domain/index.js';
import type { DashboardSession } from '../../application/index.js';

const ROLE_RANK: Record<Role, number> = { viewer: 0, operator: 1, admin: 2 };

export function bearerToken(header: string | undefined): string | undefined {
  if (header === undefined) return undefined;
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match?.[1];
}

/** preHandler: authenticates the bearer token and requires at least `minimum`. */
export function requireRole(minimum: Role): preHandlerAsyncHookHandler {
  return async (request: FastifyRequest, _reply: FastifyReply) => {
    const session = request.server.hub.auth.authenticateDashboard(bearerToken(request.headers.authorization));
    if (ROLE_RANK[session.principal.role] < ROLE_RANK[minimum]) {
      throw new ControlPlaneError('Unauthorized', `Requires role ${minimum}`);
    }
    request.session = session;
  };
}

/** Session set by `requireRole`; throws if a route forgot the hook. */
export function sessionOf(request: FastifyRequest): DashboardSession {
  if (request.session === null) {
    throw new ControlPlaneError('Unauthenticated', 'Missing bearer token');
  }
  return request.session;
}

export function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
