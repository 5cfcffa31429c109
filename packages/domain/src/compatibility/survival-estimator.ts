/**
 * Proportional-hazards survival estimator
 *
 * linear predictor = Σ coefficient × feature
 * hazard ratio     = e^(linear predictor)
 * S(t)             = baseline(t)^(hazard ratio)
 *
 * @module domain/compatibility/survival-estimator
 */

import type {
  RiskAssessment,
  SurvivalHorizon,
  SurvivalProbabilities,
  SurvivalResult,
} from '@pairmatch/types';

import { confidenceFromCompleteness } from './confidence.js';
import type { ExtractedFeatures } from './feature-extractor.js';
import type { ScoringModelTables } from './model-tables.js';

const PRIMARY_HORIZON: SurvivalHorizon = '5_year';

const clamp01 = (value: number): number => Math.max(0, Math.min(1, value));

/**
 * Σ coefficient × value. Features without a coefficient and coefficients
 * without a feature are skipped.
 */
export function computeLinearPredictor(
  features: Readonly<Record<string, number>>,
  coefficients: Readonly<Record<string, number>>
): number {
  let linearPredictor = 0;
  for (const [name, value] of Object.entries(features)) {
    const coefficient = coefficients[name];
    if (coefficient !== undefined) {
      linearPredictor += coefficient * value;
    }
  }
  return linearPredictor;
}

/**
 * Adjust each baseline survival probability by the hazard ratio
 */
export function adjustSurvival(
  baseline: Readonly<Record<SurvivalHorizon, number>>,
  hazardRatio: number
): SurvivalProbabilities {
  return {
    '1_year': clamp01(Math.pow(baseline['1_year'], hazardRatio)),
    '3_year': clamp01(Math.pow(baseline['3_year'], hazardRatio)),
    '5_year': clamp01(Math.pow(baseline['5_year'], hazardRatio)),
    '10_year': clamp01(Math.pow(baseline['10_year'], hazardRatio)),
  };
}

/**
 * First matching rule wins
 */
export function assessRisk(hazardRatio: number, fiveYearSurvival: number): RiskAssessment {
  if (hazardRatio > 2.0 || fiveYearSurvival < 0.5) return 'HIGH_RISK';
  if (hazardRatio > 1.5 || fiveYearSurvival < 0.7) return 'MODERATE_RISK';
  return 'LOW_RISK';
}

export function estimateSurvival(
  extracted: ExtractedFeatures,
  tables: ScoringModelTables
): SurvivalResult {
  const { features, supplied } = extracted;

  const linearPredictor = computeLinearPredictor(features, tables.survivalCoefficients);
  const hazardRatio = Math.exp(linearPredictor);
  const survivalProbabilities = adjustSurvival(tables.baselineSurvival, hazardRatio);
  const survivalProbability = survivalProbabilities[PRIMARY_HORIZON];

  const featureCount = Object.keys(tables.survivalCoefficients).length;
  const confidenceLevel = confidenceFromCompleteness(
    supplied.size / featureCount,
    tables.survivalConfidence
  );

  return {
    linearPredictor,
    hazardRatio,
    survivalProbabilities,
    survivalProbability,
    riskAssessment: assessRisk(hazardRatio, survivalProbability),
    confidenceLevel,
    features,
  };
}
