export * from './CompatibilityScoringService.js';
