/**
 * Service health and description endpoints
 *
 * - GET /health - Liveness with service name and version
 * - GET /info   - Supported methods and endpoint listing
 */

import type { FastifyPluginAsync } from 'fastify';
import { ALGORITHM_VERSION } from '@pairmatch/domain';
import { SCORING_METHODS } from '@pairmatch/types';

export interface ServiceRouteDependencies {
  serviceName: string;
  version: string;
  clock?: () => Date;
}

export interface HealthResponse {
  status: 'UP';
  service: string;
  version: string;
  timestamp: string;
}

export const SCORING_ENDPOINTS = Object.freeze([
  'POST /api/v1/scoring/calculate',
  'POST /api/v1/scoring/calculate-batch',
  'GET /api/v1/scoring/cached/:donorPairId/:recipientPairId',
  'GET /api/v1/scoring/donor/:donorPairId',
  'GET /api/v1/scoring/recipient/:recipientPairId',
  'GET /api/v1/scoring/statistics',
  'GET /api/v1/scoring/model-performance',
  'GET /api/v1/scoring/health',
  'GET /api/v1/scoring/info',
  'POST /api/v1/scoring/events/donor-registered',
]);

export function createServiceRoutes(deps: ServiceRouteDependencies): FastifyPluginAsync {
  const clock = deps.clock ?? (() => new Date());

  const serviceRoutes: FastifyPluginAsync = async (fastify) => {
    fastify.get('/health', async (): Promise<HealthResponse> => {
      fastify.log.debug('Health check requested');
      return {
        status: 'UP',
        service: deps.serviceName,
        version: deps.version,
        timestamp: clock().toISOString(),
      };
    });

    fastify.get('/info', async () => ({
      service: deps.serviceName,
      version: deps.version,
      description: 'Donor/recipient compatibility scoring for kidney paired exchange',
      algorithmVersion: ALGORITHM_VERSION,
      algorithms: ['Cox proportional hazards survival model', 'Multi-criteria decision analysis'],
      supportedMethods: SCORING_METHODS,
      features: [
        'Survival probability prediction',
        'Multi-criteria compatibility scoring',
        'Batch scoring',
        'Scoring on donor registration events',
        'Per-pair score caching',
      ],
      endpoints: SCORING_ENDPOINTS,
    }));
  };

  return serviceRoutes;
}
