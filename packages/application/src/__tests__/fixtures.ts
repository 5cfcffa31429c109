import { vi } from 'vitest';
import { createCompatibilityScoringEngine } from '@pairmatch/domain';
import type { CompatibilityScore, ScoringRequest } from '@pairmatch/types';

import type { CompatibilityScoreRepository } from '../ports/secondary/persistence/CompatibilityScoreRepository.js';
import type { ScoringEventPublisher } from '../ports/secondary/messaging/ScoringEventPublisher.js';

export const DONOR_PAIR_ID = '6f1c2a44-1d2b-4c3e-9f10-2a3b4c5d6e7f';
export const RECIPIENT_PAIR_ID = '0b7e9d21-5c4a-4e8f-8a1b-9c2d3e4f5a6b';
export const OTHER_RECIPIENT_PAIR_ID = '3c4d5e6f-7a8b-4c9d-8e0f-1a2b3c4d5e6f';

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
    scoreId: '9a8b7c6d-5e4f-4a3b-9c2d-1e0f9a8b7c6d',
    donorPairId: DONOR_PAIR_ID,
    recipientPairId: RECIPIENT_PAIR_ID,
    calculatedAt: '2024-02-01T08:00:00.000Z',
    calculatedBy: 'test-scoring',
    ...overrides,
  };
}

export function createMockRepository() {
  return {
    findByPair: vi.fn<CompatibilityScoreRepository['findByPair']>().mockResolvedValue(null),
    findByDonorPair: vi.fn<CompatibilityScoreRepository['findByDonorPair']>().mockResolvedValue([]),
    findByRecipientPair: vi
      .fn<CompatibilityScoreRepository['findByRecipientPair']>()
      .mockResolvedValue([]),
    save: vi.fn<CompatibilityScoreRepository['save']>().mockResolvedValue(undefined),
    countByMethod: vi.fn<CompatibilityScoreRepository['countByMethod']>().mockResolvedValue({}),
    countByRiskAssessment: vi
      .fn<CompatibilityScoreRepository['countByRiskAssessment']>()
      .mockResolvedValue({}),
    countSince: vi.fn<CompatibilityScoreRepository['countSince']>().mockResolvedValue(0),
    count: vi.fn<CompatibilityScoreRepository['count']>().mockResolvedValue(0),
  } satisfies CompatibilityScoreRepository;
}

export function createMockPublisher() {
  return {
    publish: vi.fn<ScoringEventPublisher['publish']>().mockResolvedValue(undefined),
  } satisfies ScoringEventPublisher;
}
