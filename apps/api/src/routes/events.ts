/**
 * Inbound domain events
 *
 * - POST /events/donor-registered - Score a newly registered pair (202)
 *
 * The handler never throws for bad messages; the outcome says whether the
 * pair was scored, dropped, skipped or failed.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { DonorRegistrationHandler } from '@pairmatch/application';

export interface EventRouteDependencies {
  donorRegistration: DonorRegistrationHandler;
}

export function createEventRoutes(deps: EventRouteDependencies): FastifyPluginAsync {
  const eventRoutes: FastifyPluginAsync = async (fastify) => {
    fastify.post('/events/donor-registered', async (request, reply) => {
      const outcome = await deps.donorRegistration.handle(request.body, request.correlationId);
      return reply.status(202).send(outcome);
    });
  };

  return eventRoutes;
}
