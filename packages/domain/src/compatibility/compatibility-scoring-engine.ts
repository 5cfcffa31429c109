/**
 * Compatibility Scoring Engine
 *
 * Entry point for donor/recipient scoring. Validates the request, extracts
 * survival features, runs the survival and criteria branches independently and
 * fuses the two results.
 *
 * The engine is synchronous and holds nothing but its frozen model tables, so
 * a single instance can serve concurrent callers.
 *
 * @module domain/compatibility/compatibility-scoring-engine
 */

import { AppError, ComputationError, validationErrorFromZod } from '@pairmatch/core';
import {
  ScoringRequestSchema,
  type FusedScore,
  type ScoringRequest,
  type ScoringRequestInput,
} from '@pairmatch/types';

import { aggregateCriteria } from './criteria-aggregator.js';
import { extractSurvivalFeatures } from './feature-extractor.js';
import {
  DEFAULT_MODEL_TABLES,
  type CriteriaModelMetadata,
  type ScoringModelTables,
  type SurvivalModelMetadata,
} from './model-tables.js';
import { fuseScores } from './score-fusion.js';
import { estimateSurvival } from './survival-estimator.js';

export interface ModelPerformance {
  readonly survivalModel: SurvivalModelMetadata;
  readonly criteriaModel: CriteriaModelMetadata;
  readonly overallAccuracy: number;
}

/**
 * Validate a raw scoring request
 *
 * @throws ValidationError with zod's flattened field errors
 */
export function parseScoringRequest(input: unknown): ScoringRequest {
  const result = ScoringRequestSchema.safeParse(input);
  if (!result.success) {
    throw validationErrorFromZod('Invalid scoring request', result.error);
  }
  return result.data;
}

/**
 * Reject NaN/Infinity anywhere in the numeric output
 */
function assertFiniteScore(score: FusedScore): void {
  const values = [
    score.overallScore,
    score.confidenceLevel,
    score.survival.linearPredictor,
    score.survival.hazardRatio,
    ...Object.values(score.survival.survivalProbabilities),
    score.criteria.score,
    ...Object.values(score.criteria.scores),
  ];

  if (!values.every(Number.isFinite)) {
    throw new RangeError('Scoring output contains a non-finite value');
  }
}

export class CompatibilityScoringEngine {
  constructor(private readonly tables: ScoringModelTables = DEFAULT_MODEL_TABLES) {}

  /**
   * Score a donor/recipient pair
   *
   * @throws ValidationError when a required field is missing or out of range
   * @throws ComputationError on any failure after validation; no partial result
   */
  score(request: ScoringRequestInput): FusedScore {
    const parsed = parseScoringRequest(request);

    try {
      const extracted = extractSurvivalFeatures(parsed, this.tables.featureDefaults);
      const survival = estimateSurvival(extracted, this.tables);
      const criteria = aggregateCriteria(parsed, this.tables);

      const fused = fuseScores({ survival, criteria, method: parsed.scoring?.method }, this.tables);
      assertFiniteScore(fused);
      return fused;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new ComputationError('Compatibility scoring failed', error);
    }
  }

  getSurvivalModelMetadata(): SurvivalModelMetadata {
    return { ...this.tables.survivalMetadata };
  }

  getModelPerformance(): ModelPerformance {
    return {
      survivalModel: this.getSurvivalModelMetadata(),
      criteriaModel: { ...this.tables.criteriaMetadata },
      overallAccuracy: this.tables.overallAccuracy,
    };
  }
}

export function createCompatibilityScoringEngine(
  tables: ScoringModelTables = DEFAULT_MODEL_TABLES
): CompatibilityScoringEngine {
  return new CompatibilityScoringEngine(tables);
}
