/**
 * Compatibility scoring schemas for donor/recipient pair evaluation
 *
 * Requests are validated at every entry point (HTTP, donor events, direct calls)
 * before any computation runs. Result schemas double as the persisted record
 * shape and are used to re-hydrate rows read back from storage.
 */
import { z } from 'zod';

import { TimestampSchema, UUIDSchema } from './common.js';

// =============================================================================
// Scoring controls
// =============================================================================

export const SCORING_METHODS = ['SURVIVAL', 'CRITERIA', 'HYBRID'] as const;

/**
 * Method names accepted from older clients
 */
const LEGACY_METHOD_NAMES: Readonly<Record<string, (typeof SCORING_METHODS)[number]>> =
  Object.freeze({
    COX: 'SURVIVAL',
    MCDA: 'CRITERIA',
  });

/**
 * Scoring method (case-insensitive, legacy aliases accepted)
 */
export const ScoringMethodSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toUpperCase();
  return LEGACY_METHOD_NAMES[normalized] ?? normalized;
}, z.enum(SCORING_METHODS));

/**
 * Caller-supplied criterion weights, normalized before use
 */
export const CriterionWeightsSchema = z
  .record(z.string().min(1), z.number().finite().nonnegative())
  .refine(
    (weights) => {
      const values = Object.values(weights);
      return values.length === 0 || values.reduce((sum, weight) => sum + weight, 0) > 0;
    },
    { message: 'Custom weights must not sum to zero' }
  );

export const ScoringControlsSchema = z.object({
  method: ScoringMethodSchema.optional(),
  customWeights: CriterionWeightsSchema.nullish(),
});

// =============================================================================
// Donor / recipient attributes
// =============================================================================

const PartyAttributesSchema = z.object({
  bloodType: z.string().trim().min(1, 'Blood type is required').max(8),
  sex: z.string().trim().max(16).nullish(),
  bmi: z.number().positive().max(100).nullish(),
  latitude: z.number().min(-90).max(90).nullish(),
  longitude: z.number().min(-180).max(180).nullish(),
  hlaType: z.string().max(256).nullish(),
  location: z.string().max(256).nullish(),
  medicalHistory: z.array(z.string().max(128)).nullish(),
});

export const DonorAttributesSchema = PartyAttributesSchema.extend({
  age: z
    .number()
    .int()
    .min(18, 'Donor age must be at least 18')
    .max(80, 'Donor age must be at most 80'),
});

export const RecipientAttributesSchema = PartyAttributesSchema.extend({
  age: z
    .number()
    .int()
    .min(1, 'Recipient age must be at least 1')
    .max(80, 'Recipient age must be at most 80'),
});

export const ClinicalAttributesSchema = z.object({
  /** HLA mismatch count (0 = full match, 6 = full mismatch) */
  hlaMismatches: z.number().int().min(0).max(6).nullish(),
  previousTransplant: z.boolean().nullish(),
  monthsOnDialysis: z.number().int().min(0).max(1200).nullish(),
  /** LOW, MODERATE/MEDIUM, HIGH/URGENT; anything else is treated as unknown */
  urgency: z.string().trim().max(32).nullish(),
  /** Crossmatch result, positive above 0.5 */
  crossmatchResult: z.number().min(0).max(1).nullish(),
});

// =============================================================================
// Scoring request
// =============================================================================

export const ScoringRequestSchema = z.object({
  donorPairId: UUIDSchema,
  recipientPairId: UUIDSchema,
  donor: DonorAttributesSchema,
  recipient: RecipientAttributesSchema,
  clinical: ClinicalAttributesSchema.optional(),
  scoring: ScoringControlsSchema.optional(),
});

export const BatchScoringRequestSchema = z.array(ScoringRequestSchema).min(1);

// =============================================================================
// Survival model results
// =============================================================================

export const SURVIVAL_FEATURE_NAMES = [
  'age_difference',
  'hla_mismatches',
  'donor_age',
  'recipient_age',
  'donor_bmi',
  'recipient_bmi',
  'blood_type_mismatch',
  'geographic_distance',
  'time_on_dialysis',
  'previous_transplant',
  'crossmatch_positive',
  'donor_gender_male',
  'recipient_gender_male',
  'urgent_status',
] as const;

export const SurvivalFeaturesSchema = z.object({
  age_difference: z.number(),
  hla_mismatches: z.number(),
  donor_age: z.number(),
  recipient_age: z.number(),
  donor_bmi: z.number(),
  recipient_bmi: z.number(),
  blood_type_mismatch: z.number(),
  geographic_distance: z.number(),
  time_on_dialysis: z.number(),
  previous_transplant: z.number(),
  crossmatch_positive: z.number(),
  donor_gender_male: z.number(),
  recipient_gender_male: z.number(),
  urgent_status: z.number(),
});

const ProbabilitySchema = z.number().min(0).max(1);

export const SurvivalProbabilitiesSchema = z.object({
  '1_year': ProbabilitySchema,
  '3_year': ProbabilitySchema,
  '5_year': ProbabilitySchema,
  '10_year': ProbabilitySchema,
});

export const RiskAssessmentSchema = z.enum(['LOW_RISK', 'MODERATE_RISK', 'HIGH_RISK']);

export const SurvivalResultSchema = z.object({
  linearPredictor: z.number(),
  hazardRatio: z.number().nonnegative(),
  survivalProbabilities: SurvivalProbabilitiesSchema,
  /** 5-year adjusted survival */
  survivalProbability: ProbabilitySchema,
  riskAssessment: RiskAssessmentSchema,
  confidenceLevel: ProbabilitySchema,
  features: SurvivalFeaturesSchema,
});

// =============================================================================
// Multi-criteria results
// =============================================================================

export const CRITERION_NAMES = [
  'blood_type',
  'hla_compatibility',
  'age_compatibility',
  'geographic_proximity',
  'medical_history',
  'urgency',
] as const;

export const CriterionScoresSchema = z.object({
  blood_type: ProbabilitySchema,
  hla_compatibility: ProbabilitySchema,
  age_compatibility: ProbabilitySchema,
  geographic_proximity: ProbabilitySchema,
  medical_history: ProbabilitySchema,
  urgency: ProbabilitySchema,
});

export const CompatibilityLevelSchema = z.enum(['EXCELLENT', 'GOOD', 'MODERATE', 'POOR']);

export const CriteriaResultSchema = z.object({
  scores: CriterionScoresSchema,
  /** Weights actually applied; always sums to 1.0 */
  weights: z.record(z.string(), z.number()),
  weightedScores: z.record(z.string(), z.number()),
  score: ProbabilitySchema,
  compatibilityLevel: CompatibilityLevelSchema,
  confidenceLevel: ProbabilitySchema,
});

// =============================================================================
// Fused score
// =============================================================================

export const RecommendationSchema = z.enum([
  'STRONGLY_RECOMMENDED',
  'RECOMMENDED',
  'CONSIDER_WITH_CAUTION',
  'NOT_RECOMMENDED',
]);

export const FusedScoreSchema = z.object({
  overallScore: ProbabilitySchema,
  confidenceLevel: ProbabilitySchema,
  riskAssessment: RiskAssessmentSchema,
  compatibilityLevel: CompatibilityLevelSchema,
  recommendation: RecommendationSchema,
  method: z.enum(SCORING_METHODS),
  algorithmVersion: z.string(),
  survival: SurvivalResultSchema,
  criteria: CriteriaResultSchema,
});

/**
 * Persisted compatibility score for a donor/recipient pair
 */
export const CompatibilityScoreSchema = FusedScoreSchema.extend({
  scoreId: UUIDSchema,
  donorPairId: UUIDSchema,
  recipientPairId: UUIDSchema,
  calculatedAt: TimestampSchema,
  calculatedBy: z.string(),
  processingTimeMs: z.number().nonnegative().optional(),
});

// =============================================================================
// Type exports
// =============================================================================

export type ScoringMethod = z.infer<typeof ScoringMethodSchema>;
export type CriterionWeights = z.infer<typeof CriterionWeightsSchema>;
export type ScoringControls = z.infer<typeof ScoringControlsSchema>;
export type DonorAttributes = z.infer<typeof DonorAttributesSchema>;
export type RecipientAttributes = z.infer<typeof RecipientAttributesSchema>;
export type ClinicalAttributes = z.infer<typeof ClinicalAttributesSchema>;
export type ScoringRequest = z.infer<typeof ScoringRequestSchema>;
export type ScoringRequestInput = z.input<typeof ScoringRequestSchema>;
export type SurvivalFeatureName = (typeof SURVIVAL_FEATURE_NAMES)[number];
export type SurvivalFeatures = z.infer<typeof SurvivalFeaturesSchema>;
export type SurvivalProbabilities = z.infer<typeof SurvivalProbabilitiesSchema>;
export type SurvivalHorizon = keyof SurvivalProbabilities;
export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;
export type SurvivalResult = z.infer<typeof SurvivalResultSchema>;
export type CriterionName = (typeof CRITERION_NAMES)[number];
export type CriterionScores = z.infer<typeof CriterionScoresSchema>;
export type CompatibilityLevel = z.infer<typeof CompatibilityLevelSchema>;
export type CriteriaResult = z.infer<typeof CriteriaResultSchema>;
export type Recommendation = z.infer<typeof RecommendationSchema>;
export type FusedScore = z.infer<typeof FusedScoreSchema>;
export type CompatibilityScore = z.infer<typeof CompatibilityScoreSchema>;
