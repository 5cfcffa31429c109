/**
 * PairMatch Types Package
 *
 * Zod schemas and inferred types shared by every layer of the scoring platform.
 *
 * @module @pairmatch/types
 */

export {
  UUIDSchema,
  TimestampSchema,
  CorrelationIdSchema,
  type UUID,
  type Timestamp,
  type CorrelationId,
} from './schemas/common.js';

export {
  SCORING_METHODS,
  SURVIVAL_FEATURE_NAMES,
  CRITERION_NAMES,
  ScoringMethodSchema,
  CriterionWeightsSchema,
  ScoringControlsSchema,
  DonorAttributesSchema,
  RecipientAttributesSchema,
  ClinicalAttributesSchema,
  ScoringRequestSchema,
  BatchScoringRequestSchema,
  SurvivalFeaturesSchema,
  SurvivalProbabilitiesSchema,
  RiskAssessmentSchema,
  SurvivalResultSchema,
  CriterionScoresSchema,
  CompatibilityLevelSchema,
  CriteriaResultSchema,
  RecommendationSchema,
  FusedScoreSchema,
  CompatibilityScoreSchema,
  type ScoringMethod,
  type CriterionWeights,
  type ScoringControls,
  type DonorAttributes,
  type RecipientAttributes,
  type ClinicalAttributes,
  type ScoringRequest,
  type ScoringRequestInput,
  type SurvivalFeatureName,
  type SurvivalFeatures,
  type SurvivalProbabilities,
  type SurvivalHorizon,
  type RiskAssessment,
  type SurvivalResult,
  type CriterionName,
  type CriterionScores,
  type CompatibilityLevel,
  type CriteriaResult,
  type Recommendation,
  type FusedScore,
  type CompatibilityScore,
} from './schemas/compatibility.js';

export {
  DONOR_REGISTERED_TOPIC,
  DonorRegisteredEventSchema,
  type DonorRegisteredEvent,
} from './schemas/donor-events.js';
