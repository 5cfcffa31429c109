/**
 * Multi-criteria compatibility aggregation
 *
 * Six rule-table criteria, each in [0, 1], combined by a weighted sum. Custom
 * weights are normalized and used as given: a criterion the caller leaves out
 * of the map gets no weight and drops out of the sum.
 *
 * @module domain/compatibility/criteria-aggregator
 */

import { ValidationError } from '@pairmatch/core';
import {
  CRITERION_NAMES,
  type ClinicalAttributes,
  type CompatibilityLevel,
  type CriteriaResult,
  type CriterionScores,
  type CriterionName,
  type CriterionWeights,
  type ScoringRequest,
} from '@pairmatch/types';

import { bloodTypeCriterionScore } from './blood-type.js';
import { confidenceFromCompleteness } from './confidence.js';
import { isUrgent } from './feature-extractor.js';
import { distanceBetweenKm } from './geo-distance.js';
import type { ScoringModelTables } from './model-tables.js';

// ============================================================================
// INDIVIDUAL CRITERIA
// ============================================================================

export function hlaCompatibilityScore(mismatches: number | null | undefined): number {
  if (mismatches === null || mismatches === undefined) return 0.5;
  if (mismatches === 0) return 1.0;
  return Math.max(0.0, 1.0 - mismatches / 6.0);
}

export function ageCompatibilityScore(
  donorAge: number | null | undefined,
  recipientAge: number | null | undefined
): number {
  if (donorAge === null || donorAge === undefined) return 0.5;
  if (recipientAge === null || recipientAge === undefined) return 0.5;

  const difference = Math.abs(donorAge - recipientAge);
  if (difference <= 5) return 1.0;
  if (difference <= 10) return 0.8;
  if (difference <= 20) return 0.6;
  return 0.3;
}

/**
 * Proximity by great-circle distance; `null` (missing coordinates) scores 0.5
 */
export function geographicProximityScore(distanceKm: number | null): number {
  if (distanceKm === null) return 0.5;
  if (distanceKm <= 50) return 1.0;
  if (distanceKm <= 100) return 0.8;
  if (distanceKm <= 200) return 0.6;
  if (distanceKm <= 500) return 0.4;
  return 0.2;
}

export function medicalHistoryScore(clinical: ClinicalAttributes): number {
  let score = 0.7;

  if (clinical.previousTransplant === true) {
    score -= 0.2;
  }

  const months = clinical.monthsOnDialysis;
  if (months !== null && months !== undefined) {
    if (months <= 12) {
      score += 0.2;
    } else if (months > 36) {
      score -= 0.1;
    }
  }

  return Math.max(0.0, Math.min(1.0, score));
}

export function urgencyScore(urgency: string | null | undefined): number {
  if (urgency === null || urgency === undefined) return 0.5;
  if (isUrgent(urgency)) return 1.0;

  switch (urgency.trim().toUpperCase()) {
    case 'MODERATE':
    case 'MEDIUM':
      return 0.7;
    case 'LOW':
      return 0.4;
    default:
      return 0.5;
  }
}

export function scoreCriteria(request: ScoringRequest): CriterionScores {
  const { donor, recipient } = request;
  const clinical: ClinicalAttributes = request.clinical ?? {};

  return {
    blood_type: bloodTypeCriterionScore(donor.bloodType, recipient.bloodType),
    hla_compatibility: hlaCompatibilityScore(clinical.hlaMismatches),
    age_compatibility: ageCompatibilityScore(donor.age, recipient.age),
    geographic_proximity: geographicProximityScore(distanceBetweenKm(donor, recipient)),
    medical_history: medicalHistoryScore(clinical),
    urgency: urgencyScore(clinical.urgency),
  };
}

// ============================================================================
// WEIGHTS & AGGREGATION
// ============================================================================

/**
 * Divide each weight by the sum so the result sums to 1.0
 */
export function normalizeWeights(weights: CriterionWeights): Record<string, number> {
  const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);
  if (!(total > 0)) {
    throw new ValidationError('Custom weights must not sum to zero', { weights });
  }

  const normalized: Record<string, number> = {};
  for (const [name, weight] of Object.entries(weights)) {
    normalized[name] = weight / total;
  }
  return normalized;
}

/**
 * Non-empty custom weights are normalized; otherwise the defaults apply
 */
export function resolveWeights(
  customWeights: CriterionWeights | null | undefined,
  defaults: Readonly<Record<string, number>>
): Record<string, number> {
  if (customWeights && Object.keys(customWeights).length > 0) {
    return normalizeWeights(customWeights);
  }
  return { ...defaults };
}

const isCriterionName = (name: string): name is CriterionName =>
  CRITERION_NAMES.some((criterion) => criterion === name);

export function compatibilityLevelFor(score: number): CompatibilityLevel {
  if (score >= 0.8) return 'EXCELLENT';
  if (score >= 0.6) return 'GOOD';
  if (score >= 0.4) return 'MODERATE';
  return 'POOR';
}

export function aggregateCriteria(
  request: ScoringRequest,
  tables: ScoringModelTables
): CriteriaResult {
  const scores = scoreCriteria(request);
  const weights = resolveWeights(request.scoring?.customWeights, tables.defaultCriterionWeights);

  const weightedScores: Record<string, number> = {};
  let score = 0;
  for (const [name, weight] of Object.entries(weights)) {
    if (isCriterionName(name)) {
      weightedScores[name] = scores[name] * weight;
      score += scores[name] * weight;
    }
  }

  const available = CRITERION_NAMES.filter((name) => Number.isFinite(scores[name])).length;
  const confidenceLevel = confidenceFromCompleteness(
    available / CRITERION_NAMES.length,
    tables.criteriaConfidence
  );

  // Normalized weights can overshoot 1.0 by a rounding step
  score = Math.min(1.0, score);

  return {
    scores,
    weights,
    weightedScores,
    score,
    compatibilityLevel: compatibilityLevelFor(score),
    confidenceLevel,
  };
}
