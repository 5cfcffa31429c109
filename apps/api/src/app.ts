import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import {
  ValidationError,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from '@pairmatch/core';
import type {
  CompatibilityScoringUseCase,
  DonorRegistrationHandler,
} from '@pairmatch/application';

import type { AppConfig } from './config.js';
import correlationPlugin from './plugins/correlation.js';
import { createEventRoutes, createScoringRoutes, createServiceRoutes } from './routes/index.js';

/**
 * Scoring API
 *
 * HTTP surface of the compatibility scoring service. Collaborators are
 * injected so tests can build the app around in-memory adapters.
 */

export const API_PREFIX = '/api/v1/scoring';

export interface BuildAppOptions {
  config: AppConfig;
  scoring: CompatibilityScoringUseCase;
  donorRegistration: DonorRegistrationHandler;
  /** Disable request logging (tests) */
  logger?: boolean;
  clock?: () => Date;
}

/**
 * Map an error to the status and body sent to the client
 *
 * Fastify's own client errors (malformed JSON, oversize payloads) keep their
 * status; anything else unknown becomes a generic 500.
 */
export function toErrorResponse(error: FastifyError): SafeErrorDetails {
  if (isOperationalError(error)) {
    return toSafeErrorResponse(error);
  }
  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    return { code: error.code, message: error.message, statusCode: error.statusCode };
  }
  return toSafeErrorResponse(error);
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: config.logger.level,
            serializers: {
              req(request) {
                return {
                  method: request.method,
                  url: request.url,
                  correlationId: request.headers['x-correlation-id'],
                };
              },
              res(reply) {
                return {
                  statusCode: reply.statusCode,
                };
              },
            },
          },
  });

  await fastify.register(correlationPlugin);

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
    frameguard: { action: 'deny' },
    noSniff: true,
    hidePoweredBy: true,
  });

  await fastify.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST'],
  });

  // Register routes
  await fastify.register(createScoringRoutes({ scoring: options.scoring }), {
    prefix: API_PREFIX,
  });
  await fastify.register(
    createServiceRoutes({
      serviceName: config.service.name,
      version: config.service.version,
      ...(options.clock !== undefined && { clock: options.clock }),
    }),
    { prefix: API_PREFIX }
  );
  await fastify.register(createEventRoutes({ donorRegistration: options.donorRegistration }), {
    prefix: API_PREFIX,
  });

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    const response = toErrorResponse(error);

    if (response.statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.warn({ code: response.code, statusCode: response.statusCode }, 'Request rejected');
    }

    return reply.status(response.statusCode).send({
      code: response.code,
      message: response.message,
      correlationId: request.correlationId,
      ...(error instanceof ValidationError && error.details !== undefined
        ? { details: error.details }
        : {}),
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      code: 'NOT_FOUND',
      message: 'Route not found',
      correlationId: request.correlationId,
    });
  });

  return fastify;
}
