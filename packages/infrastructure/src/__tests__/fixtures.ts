import { createCompatibilityScoringEngine } from '@pairmatch/domain';
import type { CompatibilityScore, ScoringRequest } from '@pairmatch/types';

export const DONOR_PAIR_ID = '6f1c2a44-1d2b-4c3e-9f10-2a3b4c5d6e7f';
export const RECIPIENT_PAIR_ID = '0b7e9d21-5c4a-4e8f-8a1b-9c2d3e4f5a6b';
export const SCORE_ID = '9a8b7c6d-5e4f-4a3b-9c2d-1e0f9a8b7c6d';

export function buildScoringRequest(overrides: Partial<ScoringRequest> = {}): ScoringRequest {
  return {
    donorPairId: DONOR_PAIR_ID,
    recipientPairId: RECIPIENT_PAIR_ID,
    donor: { bloodType: 'A+', age: 35, sex: 'M' },
    recipient: { bloodType: 'B+', age: 42, sex: 'F' },
    clinical: { hlaMismatches: 2, urgency: 'HIGH' },
    scoring: { method: 'HYBRID' },
    ...overrides,
  };
}

export function buildStoredScore(overrides: Partial<CompatibilityScore> = {}): CompatibilityScore {
  return {
    ...createCompatibilityScoringEngine().score(buildScoringRequest()),
    scoreId: SCORE_ID,
    donorPairId: DONOR_PAIR_ID,
    recipientPairId: RECIPIENT_PAIR_ID,
    calculatedAt: '2024-02-01T08:00:00.000Z',
    calculatedBy: 'test-scoring',
    processingTimeMs: 3,
    ...overrides,
  };
}
