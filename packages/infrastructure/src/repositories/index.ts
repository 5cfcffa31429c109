/**
 * @fileoverview Repository adapters
 *
 * @module @pairmatch/infrastructure/repositories
 */

export {
  PostgresCompatibilityScoreRepository,
  type PostgresCompatibilityScoreRepositoryConfig,
} from './PostgresCompatibilityScoreRepository.js';

export { InMemoryCompatibilityScoreRepository } from './InMemoryCompatibilityScoreRepository.js';
