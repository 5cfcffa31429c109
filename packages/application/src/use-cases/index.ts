/**
 * @fileoverview Use Cases Index
 *
 * @module application/use-cases
 */

// Compatibility scoring use cases
export * from './compatibility/index.js';
