/**
 * Compatibility Scoring API Routes
 *
 * ENDPOINTS (relative to /api/v1/scoring):
 * - POST /calculate                                - Score one donor/recipient pair
 * - POST /calculate-batch                          - Score a list of pairs
 * - GET  /cached/:donorPairId/:recipientPairId     - Stored score for a pair
 * - GET  /donor/:donorPairId                       - Scores for a donor pair, best first
 * - GET  /recipient/:recipientPairId               - Scores for a recipient pair, best first
 * - GET  /statistics                               - Aggregate counts
 * - GET  /model-performance                        - Model metadata
 *
 * Errors are thrown and rendered by the application error handler.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { CompatibilityScoringUseCase } from '@pairmatch/application';
import { ScoringRequestSchema } from '@pairmatch/types';

import {
  BatchBodySchema,
  DonorPairParamsSchema,
  PairParamsSchema,
  RecipientPairParamsSchema,
  parseInput,
} from './schemas.js';

export interface ScoringRouteDependencies {
  scoring: CompatibilityScoringUseCase;
}

export function createScoringRoutes(deps: ScoringRouteDependencies): FastifyPluginAsync {
  const { scoring } = deps;

  const scoringRoutes: FastifyPluginAsync = async (fastify) => {
    // ========================================================================
    // CALCULATION
    // ========================================================================

    fastify.post('/calculate', async (request) => {
      const body = parseInput(ScoringRequestSchema, request.body, 'Invalid scoring request');

      request.log.info(
        { donorPairId: body.donorPairId, recipientPairId: body.recipientPairId },
        'Compatibility score requested'
      );

      return scoring.calculate(body, request.correlationId);
    });

    fastify.post('/calculate-batch', async (request) => {
      const body = parseInput(BatchBodySchema, request.body, 'Invalid batch scoring request');

      request.log.info({ batchSize: body.length }, 'Batch compatibility scoring requested');

      return scoring.calculateBatch(body, request.correlationId);
    });

    // ========================================================================
    // LOOKUPS
    // ========================================================================

    fastify.get('/cached/:donorPairId/:recipientPairId', async (request) => {
      const { donorPairId, recipientPairId } = parseInput(
        PairParamsSchema,
        request.params,
        'Invalid pair identifiers'
      );
      return scoring.getCachedScore(donorPairId, recipientPairId);
    });

    fastify.get('/donor/:donorPairId', async (request) => {
      const { donorPairId } = parseInput(
        DonorPairParamsSchema,
        request.params,
        'Invalid donor pair identifier'
      );
      return scoring.getScoresByDonorPair(donorPairId);
    });

    fastify.get('/recipient/:recipientPairId', async (request) => {
      const { recipientPairId } = parseInput(
        RecipientPairParamsSchema,
        request.params,
        'Invalid recipient pair identifier'
      );
      return scoring.getScoresByRecipientPair(recipientPairId);
    });

    // ========================================================================
    // REPORTING
    // ========================================================================

    fastify.get('/statistics', async () => scoring.getStatistics());

    fastify.get('/model-performance', async () => scoring.getModelPerformance());
  };

  return scoringRoutes;
}
