/**
 * Score fusion
 *
 * Merges the survival and criteria results into one overall score with a
 * combined confidence, risk label and recommendation.
 *
 * @module domain/compatibility/score-fusion
 */

import type {
  CriteriaResult,
  FusedScore,
  Recommendation,
  RiskAssessment,
  ScoringMethod,
  SurvivalResult,
} from '@pairmatch/types';

import type { ScoringModelTables } from './model-tables.js';

export const DEFAULT_SCORING_METHOD: ScoringMethod = 'HYBRID';

export interface FusionInput {
  readonly survival: SurvivalResult;
  readonly criteria: CriteriaResult;
  readonly method?: ScoringMethod | undefined;
}

export function overallScoreFor(
  method: ScoringMethod,
  survivalProbability: number,
  criteriaScore: number,
  hybridWeights: ScoringModelTables['hybridWeights']
): number {
  switch (method) {
    case 'SURVIVAL':
      return survivalProbability;
    case 'CRITERIA':
      return criteriaScore;
    case 'HYBRID':
      return Math.min(
        1.0,
        survivalProbability * hybridWeights.survival + criteriaScore * hybridWeights.criteria
      );
  }
}

/**
 * Evaluated in order, first match wins. The 0.8 boundary is inclusive.
 */
export function recommendationFor(
  overallScore: number,
  riskAssessment: RiskAssessment
): Recommendation {
  if (overallScore >= 0.8 && riskAssessment === 'LOW_RISK') return 'STRONGLY_RECOMMENDED';
  if (overallScore >= 0.6 && riskAssessment !== 'HIGH_RISK') return 'RECOMMENDED';
  if (overallScore >= 0.4) return 'CONSIDER_WITH_CAUTION';
  return 'NOT_RECOMMENDED';
}

export function fuseScores(input: FusionInput, tables: ScoringModelTables): FusedScore {
  const { survival, criteria } = input;
  const method = input.method ?? DEFAULT_SCORING_METHOD;

  const overallScore = overallScoreFor(
    method,
    survival.survivalProbability,
    criteria.score,
    tables.hybridWeights
  );

  return {
    overallScore,
    confidenceLevel: (survival.confidenceLevel + criteria.confidenceLevel) / 2.0,
    riskAssessment: survival.riskAssessment,
    compatibilityLevel: criteria.compatibilityLevel,
    recommendation: recommendationFor(overallScore, survival.riskAssessment),
    method,
    algorithmVersion: tables.algorithmVersion,
    survival,
    criteria,
  };
}
