/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters implementing the secondary ports declared by the application
 * layer.
 *
 * @module @pairmatch/infrastructure
 *
 * ## Architecture Overview
 *
 * ```
 *    APPLICATION LAYER                    INFRASTRUCTURE LAYER
 *   ┌─────────────────┐                  ┌─────────────────────┐
 *   │                 │                  │  ┌───────────────┐  │
 *   │  Compatibility  │─────implements──▶│  │ PostgreSQL    │  │
 *   │  Score          │                  │  │ Repository    │  │
 *   │  Repository     │─────implements──▶│  │ In-Memory     │  │
 *   │                 │                  │  └───────────────┘  │
 *   │                 │                  │                     │
 *   │  Scoring Event  │                  │  ┌───────────────┐  │
 *   │  Publisher      │─────implements──▶│  │ Event Store   │  │
 *   │                 │                  │  │ Publisher     │  │
 *   └─────────────────┘                  │  └───────────────┘  │
 *                                        └─────────────────────┘
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * import { createScoringAdapters } from '@pairmatch/infrastructure';
 *
 * const adapters = createScoringAdapters({
 *   source: 'pairmatch-scoring',
 *   databaseUrl: process.env.DATABASE_URL,
 * });
 * ```
 */

// ============================================================================
// REPOSITORIES
// ============================================================================

export * from './repositories/index.js';

// ============================================================================
// MESSAGING
// ============================================================================

export * from './messaging/index.js';

// ============================================================================
// WIRING
// ============================================================================

export {
  createScoringAdapters,
  type ScoringAdapterOptions,
  type ScoringAdapters,
} from './adapters.js';
