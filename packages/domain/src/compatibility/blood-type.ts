/**
 * ABO blood type rules
 *
 * The survival model and the criteria model use different rules: the survival
 * feature is a containment check, the criterion score a prefix table.
 *
 * @module domain/compatibility/blood-type
 */

type BloodType = string | null | undefined;

const normalize = (bloodType: string): string => bloodType.trim().toUpperCase();

/**
 * Survival-model compatibility. Missing either side is incompatible.
 */
export function isBloodTypeCompatible(donor: BloodType, recipient: BloodType): boolean {
  if (!donor || !recipient) return false;

  const d = normalize(donor);
  const r = normalize(recipient);

  // Universal donor
  if (d.includes('O')) return true;
  // Universal recipient
  if (r.includes('AB')) return true;
  if (d === r) return true;

  return (d.includes('A') || d.includes('B')) && r.includes('AB');
}

/**
 * Criteria-model blood type score in [0, 1]. Missing either side scores 0.
 */
export function bloodTypeCriterionScore(donor: BloodType, recipient: BloodType): number {
  if (!donor || !recipient) return 0.0;

  const d = normalize(donor);
  const r = normalize(recipient);

  if (d === r) return 1.0;
  if (d.startsWith('O')) return 0.9;
  if (r.startsWith('AB')) return 0.8;
  if ((d.startsWith('A') || d.startsWith('B')) && r.startsWith('AB')) return 0.7;

  return 0.0;
}
