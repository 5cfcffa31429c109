/**
 * @fileoverview Domain Package Exports
 *
 * The compatibility scoring engine: pure scoring functions over frozen model
 * tables, with no I/O.
 *
 * @module @pairmatch/domain
 *
 * @example
 * ```typescript
 * import { createCompatibilityScoringEngine } from '@pairmatch/domain';
 *
 * const engine = createCompatibilityScoringEngine();
 * const result = engine.score(request);
 * console.log(result.overallScore, result.recommendation);
 * ```
 */

export * from './compatibility/index.js';
