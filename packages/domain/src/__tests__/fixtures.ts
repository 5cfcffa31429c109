import type { ScoringRequest } from '@pairmatch/types';

export const DONOR_PAIR_ID = '6f1c2a44-1d2b-4c3e-9f10-2a3b4c5d6e7f';
export const RECIPIENT_PAIR_ID = '0b7e9d21-5c4a-4e8f-8a1b-9c2d3e4f5a6b';

/**
 * A+ 35-year-old male donor, B+ 42-year-old female recipient,
 * two HLA mismatches, high urgency, hybrid scoring
 */
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
