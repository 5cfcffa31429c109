/**
 * @fileoverview Compatibility Scoring Service
 *
 * Wraps the pure scoring engine with the cache-before-compute flow:
 * look up a stored score for the pair, compute on a miss, persist the new
 * record and publish `compatibility.score_calculated`.
 *
 * @module application/use-cases/compatibility/CompatibilityScoringService
 */

import { NotFoundError, ValidationError, createLogger } from '@pairmatch/core';
import {
  createCompatibilityScoringEngine,
  parseScoringRequest,
  type CompatibilityScoringEngine,
  type ModelPerformance,
} from '@pairmatch/domain';
import type { CompatibilityScore, ScoringRequest, ScoringRequestInput } from '@pairmatch/types';
import { v4 as uuidv4 } from 'uuid';

import type {
  CompatibilityScoringUseCase,
  ScoringStatistics,
} from '../../ports/primary/CompatibilityScoringUseCase.js';
import type { CompatibilityScoreRepository } from '../../ports/secondary/persistence/CompatibilityScoreRepository.js';
import {
  SCORE_CALCULATED_EVENT,
  createScoringEvent,
  type ScoreCalculatedEventData,
  type ScoringEventPublisher,
} from '../../ports/secondary/messaging/ScoringEventPublisher.js';

// =============================================================================
// LOGGER
// =============================================================================

const logger = createLogger({ name: 'CompatibilityScoringService' });

// =============================================================================
// TYPES
// =============================================================================

export interface CompatibilityScoringServiceConfig {
  /** Return the stored score for a pair instead of recomputing */
  cacheEnabled: boolean;
  maxBatchSize: number;
  /** Recorded as `calculatedBy` on every new score */
  serviceName: string;
}

export interface CompatibilityScoringServiceDeps {
  readonly repository: CompatibilityScoreRepository;
  readonly publisher: ScoringEventPublisher;
  readonly engine?: CompatibilityScoringEngine;
  readonly clock?: () => Date;
  readonly generateId?: () => string;
}

const DEFAULT_CONFIG: CompatibilityScoringServiceConfig = {
  cacheEnabled: true,
  maxBatchSize: 100,
  serviceName: 'pairmatch-scoring',
};

const DAY_MS = 24 * 60 * 60 * 1000;

const byOverallScoreDesc = (a: CompatibilityScore, b: CompatibilityScore): number =>
  b.overallScore - a.overallScore;

// =============================================================================
// SERVICE
// =============================================================================

export class CompatibilityScoringService implements CompatibilityScoringUseCase {
  private readonly config: CompatibilityScoringServiceConfig;
  private readonly repository: CompatibilityScoreRepository;
  private readonly publisher: ScoringEventPublisher;
  private readonly engine: CompatibilityScoringEngine;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(
    deps: CompatibilityScoringServiceDeps,
    config: Partial<CompatibilityScoringServiceConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.repository = deps.repository;
    this.publisher = deps.publisher;
    this.engine = deps.engine ?? createCompatibilityScoringEngine();
    this.clock = deps.clock ?? (() => new Date());
    this.generateId = deps.generateId ?? uuidv4;
  }

  async calculate(request: ScoringRequestInput, correlationId: string): Promise<CompatibilityScore> {
    const startedAt = Date.now();
    return this.calculateParsed(parseScoringRequest(request), correlationId, startedAt);
  }

  async calculateBatch(
    requests: readonly ScoringRequestInput[],
    correlationId: string
  ): Promise<CompatibilityScore[]> {
    if (requests.length === 0) {
      throw new ValidationError('Batch must contain at least one request');
    }
    if (requests.length > this.config.maxBatchSize) {
      throw new ValidationError(
        `Batch size ${requests.length} exceeds the limit of ${this.config.maxBatchSize}`,
        { maxBatchSize: this.config.maxBatchSize }
      );
    }

    const startedAt = Date.now();
    // Validate the whole batch before anything is scored or stored
    const parsedRequests = requests.map((request) => parseScoringRequest(request));

    logger.info({ batchSize: requests.length, correlationId }, 'Scoring batch');

    if (!this.config.cacheEnabled) {
      return Promise.all(
        parsedRequests.map((parsed) => this.calculateParsed(parsed, correlationId, startedAt))
      );
    }

    // A pair repeated within the batch resolves to the score of its first occurrence
    const byPair = new Map<string, Promise<CompatibilityScore>>();
    return Promise.all(
      parsedRequests.map((parsed) => {
        const key = `${parsed.donorPairId}:${parsed.recipientPairId}`;
        let pending = byPair.get(key);
        if (!pending) {
          pending = this.calculateParsed(parsed, correlationId, startedAt);
          byPair.set(key, pending);
        }
        return pending;
      })
    );
  }

  private async calculateParsed(
    parsed: ScoringRequest,
    correlationId: string,
    startedAt: number
  ): Promise<CompatibilityScore> {
    const { donorPairId, recipientPairId } = parsed;

    if (this.config.cacheEnabled) {
      const cached = await this.repository.findByPair(donorPairId, recipientPairId);
      if (cached) {
        logger.debug(
          { donorPairId, recipientPairId, scoreId: cached.scoreId, correlationId },
          'Returning stored compatibility score'
        );
        return cached;
      }
    }

    const fused = this.engine.score(parsed);

    const score: CompatibilityScore = {
      ...fused,
      scoreId: this.generateId(),
      donorPairId,
      recipientPairId,
      calculatedAt: this.clock().toISOString(),
      calculatedBy: this.config.serviceName,
      processingTimeMs: Date.now() - startedAt,
    };

    await this.repository.save(score);

    logger.info(
      {
        scoreId: score.scoreId,
        donorPairId,
        recipientPairId,
        overallScore: score.overallScore,
        recommendation: score.recommendation,
        method: score.method,
        correlationId,
      },
      'Compatibility score calculated'
    );

    this.publishScoreCalculated(score, correlationId);

    return score;
  }

  async getCachedScore(donorPairId: string, recipientPairId: string): Promise<CompatibilityScore> {
    const score = await this.repository.findByPair(donorPairId, recipientPairId);
    if (!score) {
      throw new NotFoundError('Compatibility score');
    }
    return score;
  }

  async getScoresByDonorPair(donorPairId: string): Promise<CompatibilityScore[]> {
    const scores = await this.repository.findByDonorPair(donorPairId);
    return [...scores].sort(byOverallScoreDesc);
  }

  async getScoresByRecipientPair(recipientPairId: string): Promise<CompatibilityScore[]> {
    const scores = await this.repository.findByRecipientPair(recipientPairId);
    return [...scores].sort(byOverallScoreDesc);
  }

  async getStatistics(now: Date = this.clock()): Promise<ScoringStatistics> {
    const [totalScores, byMethod, byRisk, scoresLast24Hours] = await Promise.all([
      this.repository.count(),
      this.repository.countByMethod(),
      this.repository.countByRiskAssessment(),
      this.repository.countSince(new Date(now.getTime() - DAY_MS)),
    ]);

    return {
      totalScores,
      scoresByMethod: {
        SURVIVAL: byMethod.SURVIVAL ?? 0,
        CRITERIA: byMethod.CRITERIA ?? 0,
        HYBRID: byMethod.HYBRID ?? 0,
      },
      scoresByRisk: {
        LOW_RISK: byRisk.LOW_RISK ?? 0,
        MODERATE_RISK: byRisk.MODERATE_RISK ?? 0,
        HIGH_RISK: byRisk.HIGH_RISK ?? 0,
      },
      scoresLast24Hours,
      generatedAt: now.toISOString(),
    };
  }

  getModelPerformance(): ModelPerformance {
    return this.engine.getModelPerformance();
  }

  /**
   * Fire and forget: a failed publish is logged, the score stands
   */
  private publishScoreCalculated(score: CompatibilityScore, correlationId: string): void {
    const eventData: ScoreCalculatedEventData = {
      donorPairId: score.donorPairId,
      recipientPairId: score.recipientPairId,
      overallScore: score.overallScore,
      confidenceLevel: score.confidenceLevel,
      riskAssessment: score.riskAssessment,
      recommendation: score.recommendation,
      calculatedAt: score.calculatedAt,
    };

    const event = createScoringEvent(
      SCORE_CALCULATED_EVENT,
      score.scoreId,
      eventData,
      correlationId
    );

    Promise.resolve()
      .then(() => this.publisher.publish(event))
      .catch((err: unknown) => {
        logger.error(
          { err, scoreId: score.scoreId, eventType: SCORE_CALCULATED_EVENT, correlationId },
          'Failed to publish compatibility score event'
        );
      });
  }
}

export function createCompatibilityScoringService(
  deps: CompatibilityScoringServiceDeps,
  config?: Partial<CompatibilityScoringServiceConfig>
): CompatibilityScoringService {
  return new CompatibilityScoringService(deps, config);
}
