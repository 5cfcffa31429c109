/**
 * @fileoverview Application Layer Package
 *
 * Hexagonal application layer for compatibility scoring.
 *
 * - **Primary Ports**: what the application offers (driving side)
 * - **Secondary Ports**: what the application needs (driven side)
 * - **Use Cases**: the scoring service around the pure engine
 * - **Events**: inbound donor registration handling
 *
 * @module @pairmatch/application
 *
 * ## Architecture Overview
 *
 * ```
 *   ┌──────────┐     ┌─────────────┐    ┌──────────────────────┐     ┌────────────┐
 *   │   REST   │────▶│   Primary   │───▶│ CompatibilityScoring │────▶│ Repository │
 *   │  Routes  │     │    Ports    │    │       Service        │     │  Adapter   │
 *   └──────────┘     └─────────────┘    └──────────┬───────────┘     └────────────┘
 *   ┌──────────┐            ▲                      │                 ┌────────────┐
 *   │  Donor   │────────────┘                      └────────────────▶│   Event    │
 *   │  Events  │                                                     │ Publisher  │
 *   └──────────┘                                                     └────────────┘
 * ```
 */

// ============================================================================
// PRIMARY PORTS (Driving Side)
// ============================================================================

export * from './ports/primary/index.js';

// ============================================================================
// SECONDARY PORTS (Driven Side)
// ============================================================================

export * from './ports/secondary/index.js';

// ============================================================================
// USE CASES
// ============================================================================

export * from './use-cases/index.js';

// ============================================================================
// EVENT HANDLERS
// ============================================================================

export * from './events/index.js';
