export { createScoringRoutes, type ScoringRouteDependencies } from './scoring.js';
export {
  createServiceRoutes,
  SCORING_ENDPOINTS,
  type HealthResponse,
  type ServiceRouteDependencies,
} from './service.js';
export { createEventRoutes, type EventRouteDependencies } from './events.js';
