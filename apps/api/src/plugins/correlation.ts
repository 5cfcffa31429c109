/**
 * Correlation ID plugin for request tracing
 *
 * Reads x-correlation-id or generates a new UUID, echoes it on the response
 * and binds it to the request logger.
 */

import { randomUUID } from 'node:crypto';

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

export const CORRELATION_HEADER = 'x-correlation-id';

const MAX_CORRELATION_ID_LENGTH = 64;

const correlationPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('correlationId', '');

  fastify.addHook('onRequest', async (request, reply) => {
    const header = request.headers[CORRELATION_HEADER];
    const correlationId =
      typeof header === 'string' && header.length > 0 && header.length <= MAX_CORRELATION_ID_LENGTH
        ? header
        : randomUUID();

    request.correlationId = correlationId;
    void reply.header(CORRELATION_HEADER, correlationId);
    request.log = request.log.child({ correlationId });
  });
};

export default fp(correlationPlugin, {
  name: 'correlation',
  fastify: '5.x',
});
