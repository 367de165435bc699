import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance } from 'fastify';
import { isControlPlaneError } from '../../domain/index.js';

/**
 * Maps thrown errors to `{ error, message }` bodies.
 *
 * ControlPlaneError carries its own kind and status. Fastify's own 4xx
 * errors (bad JSON, body too large) are validation errors. Anything else
 * is logged and answered as an opaque InternalFault.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (isControlPlaneError(error)) {
      if (error.kind === 'InternalFault') {
        request.log.error({ err: error.cause ?? error }, error.message);
      }
      return reply.status(error.statusCode).send({ error: error.kind, message: error.message });
    }

    const status = error.statusCode ?? 500;
    if (status >= 400 && status < 500) {
      return reply.status(status).send({ error: status === 404 ? 'NotFound' : 'ValidationError', message: error.message });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ error: 'InternalFault', message: 'Internal server error' });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({ error: 'NotFound', message: `Route ${request.method} ${request.url} not found` });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
