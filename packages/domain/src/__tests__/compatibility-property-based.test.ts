import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { ScoringRequest } from '@pairmatch/types';
import { createCompatibilityScoringEngine } from '../compatibility/compatibility-scoring-engine.js';
import { recommendationFor } from '../compatibility/score-fusion.js';
import { DONOR_PAIR_ID, RECIPIENT_PAIR_ID } from './fixtures.js';

/**
 * Property-Based Tests for the Compatibility Scoring Engine
 *
 * Key properties tested:
 * 1. Bounds: every score and probability stays within [0, 1]
 * 2. Determinism: same input always produces same output
 * 3. Consistency: the recommendation follows from overall score and risk
 * 4. Monotonicity: fewer HLA mismatches never lower the HLA criterion
 */

const engine = createCompatibilityScoringEngine();

const bloodTypeArbitrary = fc.constantFrom('O-', 'O+', 'A-', 'A+', 'B-', 'B+', 'AB-', 'AB+');
const sexArbitrary = fc.option(fc.constantFrom('M', 'F', 'm', 'f'), { nil: undefined });
const bmiArbitrary = fc.option(fc.double({ min: 15, max: 45, noNaN: true }), { nil: undefined });
const latitudeArbitrary = fc.option(fc.double({ min: -90, max: 90, noNaN: true }), {
  nil: undefined,
});
const longitudeArbitrary = fc.option(fc.double({ min: -180, max: 180, noNaN: true }), {
  nil: undefined,
});

const requestArbitrary: fc.Arbitrary<ScoringRequest> = fc.record({
  donorPairId: fc.constant(DONOR_PAIR_ID),
  recipientPairId: fc.constant(RECIPIENT_PAIR_ID),
  donor: fc.record({
    bloodType: bloodTypeArbitrary,
    age: fc.integer({ min: 18, max: 80 }),
    sex: sexArbitrary,
    bmi: bmiArbitrary,
    latitude: latitudeArbitrary,
    longitude: longitudeArbitrary,
  }),
  recipient: fc.record({
    bloodType: bloodTypeArbitrary,
    age: fc.integer({ min: 1, max: 80 }),
    sex: sexArbitrary,
    bmi: bmiArbitrary,
    latitude: latitudeArbitrary,
    longitude: longitudeArbitrary,
  }),
  clinical: fc.record({
    hlaMismatches: fc.option(fc.integer({ min: 0, max: 6 }), { nil: undefined }),
    previousTransplant: fc.option(fc.boolean(), { nil: undefined }),
    monthsOnDialysis: fc.option(fc.integer({ min: 0, max: 240 }), { nil: undefined }),
    urgency: fc.option(fc.constantFrom('LOW', 'MODERATE', 'MEDIUM', 'HIGH', 'URGENT', 'other'), {
      nil: undefined,
    }),
    crossmatchResult: fc.option(fc.double({ min: 0, max: 1, noNaN: true }), { nil: undefined }),
  }),
  scoring: fc.record({
    method: fc.constantFrom('SURVIVAL' as const, 'CRITERIA' as const, 'HYBRID' as const),
  }),
});

const inUnitInterval = (value: number): boolean => value >= 0 && value <= 1;

describe('Compatibility scoring properties', () => {
  it('should keep every score within [0, 1]', () => {
    fc.assert(
      fc.property(requestArbitrary, (request) => {
        const result = engine.score(request);

        return (
          inUnitInterval(result.overallScore) &&
          inUnitInterval(result.confidenceLevel) &&
          inUnitInterval(result.criteria.score) &&
          Object.values(result.survival.survivalProbabilities).every(inUnitInterval) &&
          Object.values(result.criteria.scores).every(inUnitInterval) &&
          result.survival.hazardRatio > 0
        );
      })
    );
  });

  it('should be deterministic', () => {
    fc.assert(
      fc.property(requestArbitrary, (request) => {
        expect(engine.score(request)).toEqual(engine.score(request));
      })
    );
  });

  it('should derive the recommendation from overall score and risk', () => {
    fc.assert(
      fc.property(requestArbitrary, (request) => {
        const result = engine.score(request);
        return (
          result.recommendation === recommendationFor(result.overallScore, result.riskAssessment)
        );
      })
    );
  });

  it('should sum the applied criteria weights to 1.0', () => {
    fc.assert(
      fc.property(requestArbitrary, (request) => {
        const { weights } = engine.score(request).criteria;
        const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);
        return Math.abs(total - 1) < 1e-9;
      })
    );
  });

  it('should never lower the HLA criterion when mismatches decrease', () => {
    fc.assert(
      fc.property(requestArbitrary, fc.integer({ min: 1, max: 6 }), (request, mismatches) => {
        const worse = engine.score({
          ...request,
          clinical: { ...request.clinical, hlaMismatches: mismatches },
        });
        const better = engine.score({
          ...request,
          clinical: { ...request.clinical, hlaMismatches: mismatches - 1 },
        });

        return better.criteria.scores.hla_compatibility >= worse.criteria.scores.hla_compatibility;
      })
    );
  });
});
