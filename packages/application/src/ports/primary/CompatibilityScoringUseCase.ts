/**
 * @fileoverview Primary Port - CompatibilityScoringUseCase
 *
 * What the application offers to driving adapters (HTTP routes, event
 * consumers) for donor/recipient compatibility scoring.
 *
 * @module application/ports/primary/CompatibilityScoringUseCase
 */

import type { ModelPerformance } from '@pairmatch/domain';
import type {
  CompatibilityScore,
  RiskAssessment,
  ScoringMethod,
  ScoringRequestInput,
} from '@pairmatch/types';

/**
 * Aggregate counts over stored scores
 */
export interface ScoringStatistics {
  readonly totalScores: number;
  readonly scoresByMethod: Readonly<Record<ScoringMethod, number>>;
  readonly scoresByRisk: Readonly<Record<RiskAssessment, number>>;
  /** Scores calculated in the 24 hours before `generatedAt` */
  readonly scoresLast24Hours: number;
  readonly generatedAt: string;
}

export interface CompatibilityScoringUseCase {
  /**
   * Score a pair, returning the stored score when one exists
   *
   * @throws ValidationError for malformed requests
   * @throws ComputationError when scoring fails
   */
  calculate(request: ScoringRequestInput, correlationId: string): Promise<CompatibilityScore>;

  /**
   * Score each request independently; results keep input order
   */
  calculateBatch(
    requests: readonly ScoringRequestInput[],
    correlationId: string
  ): Promise<CompatibilityScore[]>;

  /**
   * @throws NotFoundError when no score is stored for the pair
   */
  getCachedScore(donorPairId: string, recipientPairId: string): Promise<CompatibilityScore>;

  /** Ordered by overall score, best first */
  getScoresByDonorPair(donorPairId: string): Promise<CompatibilityScore[]>;

  /** Ordered by overall score, best first */
  getScoresByRecipientPair(recipientPairId: string): Promise<CompatibilityScore[]>;

  getStatistics(now?: Date): Promise<ScoringStatistics>;

  getModelPerformance(): ModelPerformance;
}
