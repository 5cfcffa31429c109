import { describe, it, expect, beforeEach } from 'vitest';

import { InMemoryCompatibilityScoreRepository } from '../repositories/InMemoryCompatibilityScoreRepository.js';
import { DONOR_PAIR_ID, RECIPIENT_PAIR_ID, buildStoredScore } from './fixtures.js';

const OTHER_DONOR_PAIR_ID = '5e6f7a8b-9c0d-4e1f-8a2b-3c4d5e6f7a8b';

describe('InMemoryCompatibilityScoreRepository', () => {
  let repository: InMemoryCompatibilityScoreRepository;

  beforeEach(() => {
    repository = new InMemoryCompatibilityScoreRepository();
  });

  it('should return null for an unknown pair', async () => {
    await expect(repository.findByPair(DONOR_PAIR_ID, RECIPIENT_PAIR_ID)).resolves.toBeNull();
  });

  it('should return the most recently calculated score for a pair', async () => {
    const older = buildStoredScore({
      scoreId: '11111111-1111-4111-8111-111111111111',
      calculatedAt: '2024-01-01T00:00:00.000Z',
    });
    const newer = buildStoredScore({
      scoreId: '22222222-2222-4222-8222-222222222222',
      calculatedAt: '2024-02-01T00:00:00.000Z',
    });
    await repository.save(newer);
    await repository.save(older);

    await expect(repository.findByPair(DONOR_PAIR_ID, RECIPIENT_PAIR_ID)).resolves.toEqual(newer);
  });

  it('should list scores by donor and by recipient pair', async () => {
    await repository.save(buildStoredScore());
    await repository.save(
      buildStoredScore({
        scoreId: '33333333-3333-4333-8333-333333333333',
        donorPairId: OTHER_DONOR_PAIR_ID,
      })
    );

    expect(await repository.findByDonorPair(DONOR_PAIR_ID)).toHaveLength(1);
    expect(await repository.findByRecipientPair(RECIPIENT_PAIR_ID)).toHaveLength(2);
  });

  it('should compute statistics', async () => {
    await repository.save(buildStoredScore({ calculatedAt: '2024-03-01T09:00:00.000Z' }));
    await repository.save(
      buildStoredScore({
        scoreId: '44444444-4444-4444-8444-444444444444',
        method: 'SURVIVAL',
        riskAssessment: 'HIGH_RISK',
        calculatedAt: '2024-02-01T09:00:00.000Z',
      })
    );

    expect(await repository.count()).toBe(2);
    expect(await repository.countByMethod()).toEqual({ HYBRID: 1, SURVIVAL: 1 });
    expect(await repository.countByRiskAssessment()).toEqual({ LOW_RISK: 1, HIGH_RISK: 1 });
    expect(await repository.countSince(new Date('2024-03-01T00:00:00.000Z'))).toBe(1);
  });

  it('should keep stored scores isolated from caller mutations', async () => {
    const score = buildStoredScore();
    await repository.save(score);
    score.overallScore = 0.1;

    const stored = await repository.findByPair(DONOR_PAIR_ID, RECIPIENT_PAIR_ID);
    expect(stored?.overallScore).toBe(buildStoredScore().overallScore);

    if (stored) {
      stored.recommendation = 'NOT_RECOMMENDED';
    }
    const [listed] = await repository.findByDonorPair(DONOR_PAIR_ID);
    expect(listed?.recommendation).toBe(buildStoredScore().recommendation);
  });
});
