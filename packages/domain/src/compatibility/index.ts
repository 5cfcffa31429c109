/**
 * Compatibility Module - Donor/Recipient Pair Scoring
 *
 * @module domain/compatibility
 */

export {
  CompatibilityScoringEngine,
  createCompatibilityScoringEngine,
  parseScoringRequest,
  type ModelPerformance,
} from './compatibility-scoring-engine.js';

export {
  DEFAULT_MODEL_TABLES,
  SURVIVAL_COEFFICIENTS,
  BASELINE_SURVIVAL,
  FEATURE_DEFAULTS,
  DEFAULT_CRITERION_WEIGHTS,
  SURVIVAL_CONFIDENCE_TABLE,
  CRITERIA_CONFIDENCE_TABLE,
  SURVIVAL_MODEL_METADATA,
  CRITERIA_MODEL_METADATA,
  ALGORITHM_VERSION,
  type ScoringModelTables,
  type ConfidenceTable,
  type ConfidenceTier,
  type FeatureDefaults,
  type SurvivalModelMetadata,
  type CriteriaModelMetadata,
} from './model-tables.js';

export { extractSurvivalFeatures, type ExtractedFeatures } from './feature-extractor.js';
export {
  estimateSurvival,
  computeLinearPredictor,
  adjustSurvival,
  assessRisk,
} from './survival-estimator.js';
export {
  aggregateCriteria,
  scoreCriteria,
  normalizeWeights,
  resolveWeights,
  compatibilityLevelFor,
} from './criteria-aggregator.js';
export {
  fuseScores,
  recommendationFor,
  overallScoreFor,
  DEFAULT_SCORING_METHOD,
  type FusionInput,
} from './score-fusion.js';
export { confidenceFromCompleteness } from './confidence.js';
export { haversineDistanceKm, distanceBetweenKm, EARTH_RADIUS_KM, type GeoPoint } from './geo-distance.js';
export { isBloodTypeCompatible, bloodTypeCriterionScore } from './blood-type.js';
