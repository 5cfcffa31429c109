/**
 * Survival feature extraction
 *
 * Turns a validated scoring request into the fixed-name numeric vector used by
 * the survival estimator. Optional inputs fall back to `FeatureDefaults`; the
 * result also records which features came from supplied values so the
 * estimator can weigh its confidence.
 *
 * @module domain/compatibility/feature-extractor
 */

import type {
  ClinicalAttributes,
  ScoringRequest,
  SurvivalFeatureName,
  SurvivalFeatures,
} from '@pairmatch/types';

import { isBloodTypeCompatible } from './blood-type.js';
import { distanceBetweenKm } from './geo-distance.js';
import type { FeatureDefaults } from './model-tables.js';

export interface ExtractedFeatures {
  readonly features: SurvivalFeatures;
  /** Features computed from supplied inputs rather than defaults */
  readonly supplied: ReadonlySet<SurvivalFeatureName>;
}

const URGENT_LEVELS: ReadonlySet<string> = new Set(['HIGH', 'URGENT']);

const indicator = (flag: boolean): number => (flag ? 1.0 : 0.0);

const isMale = (sex: string | null | undefined): boolean => sex?.trim().toUpperCase() === 'M';

const isPresent = <T>(value: T | null | undefined): value is T =>
  value !== null && value !== undefined;

export function isUrgent(urgency: string | null | undefined): boolean {
  return isPresent(urgency) && URGENT_LEVELS.has(urgency.trim().toUpperCase());
}

/**
 * Extract the 14 survival features. The request is not modified.
 */
export function extractSurvivalFeatures(
  request: ScoringRequest,
  defaults: FeatureDefaults
): ExtractedFeatures {
  const { donor, recipient } = request;
  const clinical: ClinicalAttributes = request.clinical ?? {};
  const supplied = new Set<SurvivalFeatureName>([
    'age_difference',
    'donor_age',
    'recipient_age',
    'blood_type_mismatch',
  ]);

  const markSupplied = (name: SurvivalFeatureName, present: boolean): void => {
    if (present) supplied.add(name);
  };

  const distanceKm = distanceBetweenKm(donor, recipient);

  markSupplied('hla_mismatches', isPresent(clinical.hlaMismatches));
  markSupplied('donor_bmi', isPresent(donor.bmi));
  markSupplied('recipient_bmi', isPresent(recipient.bmi));
  markSupplied('geographic_distance', distanceKm !== null);
  markSupplied('time_on_dialysis', isPresent(clinical.monthsOnDialysis));
  markSupplied('previous_transplant', isPresent(clinical.previousTransplant));
  markSupplied('crossmatch_positive', isPresent(clinical.crossmatchResult));
  markSupplied('donor_gender_male', isPresent(donor.sex));
  markSupplied('recipient_gender_male', isPresent(recipient.sex));
  markSupplied('urgent_status', isPresent(clinical.urgency));

  const features: SurvivalFeatures = {
    age_difference: Math.abs(donor.age - recipient.age),
    hla_mismatches: clinical.hlaMismatches ?? defaults.hlaMismatches,
    donor_age: donor.age,
    recipient_age: recipient.age,
    donor_bmi: donor.bmi ?? defaults.bmi,
    recipient_bmi: recipient.bmi ?? defaults.bmi,
    blood_type_mismatch: indicator(!isBloodTypeCompatible(donor.bloodType, recipient.bloodType)),
    geographic_distance: distanceKm ?? defaults.geographicDistanceKm,
    time_on_dialysis: clinical.monthsOnDialysis ?? defaults.monthsOnDialysis,
    previous_transplant: indicator(clinical.previousTransplant ?? false),
    crossmatch_positive: indicator((clinical.crossmatchResult ?? 0.0) > 0.5),
    donor_gender_male: indicator(isMale(donor.sex)),
    recipient_gender_male: indicator(isMale(recipient.sex)),
    urgent_status: indicator(isUrgent(clinical.urgency)),
  };

  return { features, supplied };
}
