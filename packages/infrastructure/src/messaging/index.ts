export { EventStoreScoringPublisher } from './EventStoreScoringPublisher.js';
