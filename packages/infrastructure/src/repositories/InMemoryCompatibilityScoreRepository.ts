/**
 * @fileoverview In-Memory Compatibility Score Repository (Infrastructure Layer)
 *
 * Adapter implementing the CompatibilityScoreRepository port without a
 * database. Used when DATABASE_URL is not configured and in tests.
 * Records are copied on the way in and out, as a database row would be.
 *
 * @module @pairmatch/infrastructure/repositories/in-memory-compatibility-score-repository
 */

import { createLogger } from '@pairmatch/core';
import type { CompatibilityScoreRepository } from '@pairmatch/application';
import type { CompatibilityScore, RiskAssessment, ScoringMethod } from '@pairmatch/types';

const logger = createLogger({ name: 'in-memory-compatibility-score-repository' });

export class InMemoryCompatibilityScoreRepository implements CompatibilityScoreRepository {
  private scores = new Map<string, CompatibilityScore>();

  constructor() {
    logger.info('InMemoryCompatibilityScoreRepository initialized');
  }

  findByPair(donorPairId: string, recipientPairId: string): Promise<CompatibilityScore | null> {
    let latest: CompatibilityScore | null = null;
    for (const score of this.scores.values()) {
      if (score.donorPairId !== donorPairId || score.recipientPairId !== recipientPairId) {
        continue;
      }
      if (!latest || Date.parse(score.calculatedAt) >= Date.parse(latest.calculatedAt)) {
        latest = score;
      }
    }
    return Promise.resolve(latest ? structuredClone(latest) : null);
  }

  findByDonorPair(donorPairId: string): Promise<CompatibilityScore[]> {
    return Promise.resolve(this.filter((score) => score.donorPairId === donorPairId));
  }

  findByRecipientPair(recipientPairId: string): Promise<CompatibilityScore[]> {
    return Promise.resolve(this.filter((score) => score.recipientPairId === recipientPairId));
  }

  save(score: CompatibilityScore): Promise<void> {
    this.scores.set(score.scoreId, structuredClone(score));
    return Promise.resolve();
  }

  countByMethod(): Promise<Partial<Record<ScoringMethod, number>>> {
    const counts: Partial<Record<ScoringMethod, number>> = {};
    for (const score of this.scores.values()) {
      counts[score.method] = (counts[score.method] ?? 0) + 1;
    }
    return Promise.resolve(counts);
  }

  countByRiskAssessment(): Promise<Partial<Record<RiskAssessment, number>>> {
    const counts: Partial<Record<RiskAssessment, number>> = {};
    for (const score of this.scores.values()) {
      counts[score.riskAssessment] = (counts[score.riskAssessment] ?? 0) + 1;
    }
    return Promise.resolve(counts);
  }

  countSince(since: Date): Promise<number> {
    const threshold = since.getTime();
    return Promise.resolve(
      this.filter((score) => Date.parse(score.calculatedAt) >= threshold).length
    );
  }

  count(): Promise<number> {
    return Promise.resolve(this.scores.size);
  }

  private filter(predicate: (score: CompatibilityScore) => boolean): CompatibilityScore[] {
    return [...this.scores.values()].filter(predicate).map((score) => structuredClone(score));
  }
}
