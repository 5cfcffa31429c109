/**
 * @fileoverview Secondary Port - CompatibilityScoreRepository
 *
 * Storage for computed compatibility scores. One record per
 * (donorPairId, recipientPairId) is the latest score for that pair; the
 * scoring service reads it before computing and writes after.
 *
 * @module application/ports/secondary/persistence/CompatibilityScoreRepository
 */

import type { CompatibilityScore, RiskAssessment, ScoringMethod } from '@pairmatch/types';

export interface CompatibilityScoreRepository {
  /**
   * Most recent score for the pair, or null when none is stored
   */
  findByPair(donorPairId: string, recipientPairId: string): Promise<CompatibilityScore | null>;

  findByDonorPair(donorPairId: string): Promise<CompatibilityScore[]>;

  findByRecipientPair(recipientPairId: string): Promise<CompatibilityScore[]>;

  save(score: CompatibilityScore): Promise<void>;

  countByMethod(): Promise<Partial<Record<ScoringMethod, number>>>;

  countByRiskAssessment(): Promise<Partial<Record<RiskAssessment, number>>>;

  /** Scores calculated at or after `since` */
  countSince(since: Date): Promise<number>;

  count(): Promise<number>;
}
