/**
 * @fileoverview Secondary Ports Index
 *
 * Secondary ports define what the application needs from infrastructure.
 *
 * @module application/ports/secondary
 */

// Persistence ports
export * from './persistence/CompatibilityScoreRepository.js';

// Messaging ports
export * from './messaging/ScoringEventPublisher.js';
