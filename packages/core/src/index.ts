/**
 * @pairmatch/core
 *
 * Logging, errors, environment validation and the event store shared by
 * every scoring package.
 */

export {
  createLogger,
  redactObject,
  type CreateLoggerOptions,
  type Logger,
} from './logger.js';

export {
  AppError,
  ValidationError,
  ComputationError,
  NotFoundError,
  DatabaseOperationError,
  validationErrorFromZod,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export { AppEnvSchema, validateEnv, type AppEnv } from './env.js';

export {
  EventStore,
  InMemoryEventStore,
  PostgresEventStore,
  type EventStoreRepository,
  type EmitEventInput,
  type PostgresEventStoreConfig,
  type StoredEvent,
  type StoredEventMetadata,
} from './event-store.js';
