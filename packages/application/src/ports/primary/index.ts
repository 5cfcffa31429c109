/**
 * @fileoverview Primary Ports Index
 *
 * Primary ports define what the application offers to driving adapters.
 *
 * @module application/ports/primary
 */

export * from './CompatibilityScoringUseCase.js';
