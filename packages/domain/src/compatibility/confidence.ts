import type { ConfidenceTable } from './model-tables.js';

/**
 * Map a completeness fraction in [0, 1] to a discretized confidence level
 */
export function confidenceFromCompleteness(completeness: number, table: ConfidenceTable): number {
  for (const tier of table.tiers) {
    if (completeness >= tier.minCompleteness) {
      return tier.confidence;
    }
  }
  return table.fallback;
}
