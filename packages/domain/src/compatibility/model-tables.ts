/**
 * Fixed model tables for compatibility scoring
 *
 * Built once at module load and frozen. Scoring functions receive these
 * through a `ScoringModelTables` parameter instead of reading globals.
 *
 * @module domain/compatibility/model-tables
 */

import type { CriterionName, SurvivalFeatureName, SurvivalHorizon } from '@pairmatch/types';

// ============================================================================
// TYPES
// ============================================================================

/**
 * One step of a discretized confidence table: fractions at or above
 * `minCompleteness` map to `confidence`
 */
export interface ConfidenceTier {
  readonly minCompleteness: number;
  readonly confidence: number;
}

export interface ConfidenceTable {
  /** Ordered from highest threshold to lowest */
  readonly tiers: readonly ConfidenceTier[];
  readonly fallback: number;
}

export interface SurvivalModelMetadata {
  readonly accuracy: number;
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
  readonly auc: number;
  readonly concordance: number;
  readonly version: string;
  readonly trainingDataSize: number;
  readonly lastTrained: string;
}

export interface CriteriaModelMetadata {
  readonly accuracy: number;
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
}

/**
 * Values substituted for optional inputs that were not supplied
 */
export interface FeatureDefaults {
  readonly hlaMismatches: number;
  readonly bmi: number;
  readonly monthsOnDialysis: number;
  readonly geographicDistanceKm: number;
}

export interface ScoringModelTables {
  readonly survivalCoefficients: Readonly<Record<SurvivalFeatureName, number>>;
  readonly baselineSurvival: Readonly<Record<SurvivalHorizon, number>>;
  readonly featureDefaults: FeatureDefaults;
  readonly defaultCriterionWeights: Readonly<Record<CriterionName, number>>;
  readonly survivalConfidence: ConfidenceTable;
  readonly criteriaConfidence: ConfidenceTable;
  readonly hybridWeights: { readonly survival: number; readonly criteria: number };
  readonly survivalMetadata: SurvivalModelMetadata;
  readonly criteriaMetadata: CriteriaModelMetadata;
  readonly overallAccuracy: number;
  readonly algorithmVersion: string;
}

// ============================================================================
// TABLES
// ============================================================================

/**
 * Proportional-hazards coefficients, one per survival feature
 */
export const SURVIVAL_COEFFICIENTS = Object.freeze({
  age_difference: -0.02,
  hla_mismatches: -0.15,
  donor_age: -0.01,
  recipient_age: -0.008,
  donor_bmi: -0.05,
  recipient_bmi: -0.03,
  blood_type_mismatch: -0.3,
  geographic_distance: -0.001,
  time_on_dialysis: -0.02,
  previous_transplant: -0.25,
  crossmatch_positive: -0.8,
  donor_gender_male: 0.1,
  recipient_gender_male: 0.05,
  urgent_status: -0.2,
} satisfies Record<SurvivalFeatureName, number>);

/**
 * Baseline graft survival at each horizon
 */
export const BASELINE_SURVIVAL = Object.freeze({
  '1_year': 0.95,
  '3_year': 0.85,
  '5_year': 0.75,
  '10_year': 0.6,
} satisfies Record<SurvivalHorizon, number>);

export const FEATURE_DEFAULTS: FeatureDefaults = Object.freeze({
  hlaMismatches: 3,
  bmi: 25.0,
  monthsOnDialysis: 12,
  geographicDistanceKm: 100,
});

export const DEFAULT_CRITERION_WEIGHTS = Object.freeze({
  blood_type: 0.25,
  hla_compatibility: 0.3,
  age_compatibility: 0.15,
  geographic_proximity: 0.1,
  medical_history: 0.1,
  urgency: 0.1,
} satisfies Record<CriterionName, number>);

/**
 * The survival and criteria tables were tuned separately and differ below 0.7
 */
export const SURVIVAL_CONFIDENCE_TABLE: ConfidenceTable = Object.freeze({
  tiers: Object.freeze([
    { minCompleteness: 0.9, confidence: 0.95 },
    { minCompleteness: 0.8, confidence: 0.85 },
    { minCompleteness: 0.7, confidence: 0.75 },
    { minCompleteness: 0.6, confidence: 0.65 },
  ]),
  fallback: 0.5,
});

export const CRITERIA_CONFIDENCE_TABLE: ConfidenceTable = Object.freeze({
  tiers: Object.freeze([
    { minCompleteness: 0.9, confidence: 0.95 },
    { minCompleteness: 0.8, confidence: 0.85 },
    { minCompleteness: 0.7, confidence: 0.75 },
  ]),
  fallback: 0.6,
});

export const SURVIVAL_MODEL_METADATA: SurvivalModelMetadata = Object.freeze({
  accuracy: 0.85,
  precision: 0.83,
  recall: 0.87,
  f1: 0.85,
  auc: 0.88,
  concordance: 0.82,
  version: '1.0.0',
  trainingDataSize: 10000,
  lastTrained: '2024-01-15',
});

export const CRITERIA_MODEL_METADATA: CriteriaModelMetadata = Object.freeze({
  accuracy: 0.82,
  precision: 0.85,
  recall: 0.8,
  f1: 0.82,
});

export const ALGORITHM_VERSION = '1.0.0';

export const DEFAULT_MODEL_TABLES: ScoringModelTables = Object.freeze({
  survivalCoefficients: SURVIVAL_COEFFICIENTS,
  baselineSurvival: BASELINE_SURVIVAL,
  featureDefaults: FEATURE_DEFAULTS,
  defaultCriterionWeights: DEFAULT_CRITERION_WEIGHTS,
  survivalConfidence: SURVIVAL_CONFIDENCE_TABLE,
  criteriaConfidence: CRITERIA_CONFIDENCE_TABLE,
  hybridWeights: Object.freeze({ survival: 0.6, criteria: 0.4 }),
  survivalMetadata: SURVIVAL_MODEL_METADATA,
  criteriaMetadata: CRITERIA_MODEL_METADATA,
  overallAccuracy: 0.87,
  algorithmVersion: ALGORITHM_VERSION,
});
