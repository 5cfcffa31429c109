import pg from 'pg';
import { v4 as uuidv4 } from 'uuid';

import { DatabaseOperationError } from './errors.js';
import { createLogger } from './logger.js';

/**
 * Event Store - append-only log of scoring events
 *
 * Each event carries an idempotency key; appending a key twice is a no-op,
 * so a retried publish never records the same score twice.
 */

const logger = createLogger({ name: 'event-store' });

export interface StoredEventMetadata {
  correlationId: string;
  causationId: string | undefined;
  idempotencyKey: string;
  timestamp: string;
  source: string;
}

export interface StoredEvent {
  id: string;
  type: string;
  aggregateId: string | undefined;
  aggregateType: string | undefined;
  payload: Record<string, unknown>;
  metadata: StoredEventMetadata;
}

export interface EventStoreRepository {
  append(event: StoredEvent): Promise<void>;
  getByCorrelationId(correlationId: string): Promise<StoredEvent[]>;
  getByAggregateId(aggregateId: string): Promise<StoredEvent[]>;
}

export interface EmitEventInput {
  type: string;
  correlationId: string;
  idempotencyKey: string;
  payload: Record<string, unknown>;
  aggregateId?: string;
  aggregateType?: string;
  causationId?: string;
}

// ============================================================================
// IN-MEMORY
// ============================================================================

export class InMemoryEventStore implements EventStoreRepository {
  private readonly events = new Map<string, StoredEvent>();

  append(event: StoredEvent): Promise<void> {
    if (!this.events.has(event.metadata.idempotencyKey)) {
      this.events.set(event.metadata.idempotencyKey, event);
    }
    return Promise.resolve();
  }

  getByCorrelationId(correlationId: string): Promise<StoredEvent[]> {
    return Promise.resolve(this.where((e) => e.metadata.correlationId === correlationId));
  }

  getByAggregateId(aggregateId: string): Promise<StoredEvent[]> {
    return Promise.resolve(this.where((e) => e.aggregateId === aggregateId));
  }

  private where(predicate: (event: StoredEvent) => boolean): StoredEvent[] {
    return [...this.events.values()].filter(predicate);
  }
}

// ============================================================================
// POSTGRESQL
// ============================================================================

export interface PostgresEventStoreConfig {
  connectionString: string;
  /** Defaults to domain_events */
  tableName?: string;
  maxConnections?: number;
  /** Pre-built pool; takes precedence over connectionString */
  pool?: pg.Pool;
}

/** Row shape of db/migrations/001_domain_events.sql */
interface EventRow {
  id: string;
  type: string;
  aggregate_id: string | null;
  aggregate_type: string | null;
  payload: Record<string, unknown>;
  correlation_id: string;
  causation_id: string | null;
  idempotency_key: string;
  timestamp: Date;
  source: string;
}

export class PostgresEventStore implements EventStoreRepository {
  private readonly pool: pg.Pool;
  private readonly tableName: string;

  constructor(config: PostgresEventStoreConfig) {
    this.pool =
      config.pool ??
      new pg.Pool({
        connectionString: config.connectionString,
        max: config.maxConnections ?? 10,
      });
    this.tableName = config.tableName ?? 'domain_events';
    logger.info({ tableName: this.tableName }, 'PostgresEventStore initialized');
  }

  async append(event: StoredEvent): Promise<void> {
    const { metadata } = event;
    try {
      await this.pool.query(
        `INSERT INTO ${this.tableName}
         (id, type, aggregate_id, aggregate_type, payload, correlation_id, causation_id, idempotency_key, timestamp, source)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (idempotency_key) DO NOTHING`,
        [
          event.id,
          event.type,
          event.aggregateId ?? null,
          event.aggregateType ?? null,
          JSON.stringify(event.payload),
          metadata.correlationId,
          metadata.causationId ?? null,
          metadata.idempotencyKey,
          metadata.timestamp,
          metadata.source,
        ]
      );
    } catch (error) {
      logger.error({ err: error, eventId: event.id, type: event.type }, 'Failed to append event');
      throw toDatabaseError('append', error);
    }
  }

  getByCorrelationId(correlationId: string): Promise<StoredEvent[]> {
    return this.select('getByCorrelationId', 'correlation_id', correlationId);
  }

  getByAggregateId(aggregateId: string): Promise<StoredEvent[]> {
    return this.select('getByAggregateId', 'aggregate_id', aggregateId);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async select(
    operation: string,
    column: 'correlation_id' | 'aggregate_id',
    value: string
  ): Promise<StoredEvent[]> {
    try {
      const result = await this.pool.query<EventRow>(
        `SELECT * FROM ${this.tableName} WHERE ${column} = $1 ORDER BY timestamp ASC`,
        [value]
      );
      return result.rows.map(rowToEvent);
    } catch (error) {
      logger.error({ err: error, operation }, 'Event query failed');
      throw toDatabaseError(operation, error);
    }
  }
}

function rowToEvent(row: EventRow): StoredEvent {
  return {
    id: row.id,
    type: row.type,
    aggregateId: row.aggregate_id ?? undefined,
    aggregateType: row.aggregate_type ?? undefined,
    payload: row.payload,
    metadata: {
      correlationId: row.correlation_id,
      causationId: row.causation_id ?? undefined,
      idempotencyKey: row.idempotency_key,
      timestamp: row.timestamp.toISOString(),
      source: row.source,
    },
  };
}

function toDatabaseError(operation: string, error: unknown): DatabaseOperationError {
  return new DatabaseOperationError(
    operation,
    error instanceof Error ? error.message : String(error),
    error instanceof Error ? error : undefined
  );
}

// ============================================================================
// FACADE
// ============================================================================

/**
 * Stamps id, timestamp and source onto emitted events and appends them
 */
export class EventStore {
  private readonly source: string;

  constructor(
    private readonly repository: EventStoreRepository,
    options: { source: string }
  ) {
    this.source = options.source;
  }

  async emit(input: EmitEventInput): Promise<StoredEvent> {
    const event: StoredEvent = {
      id: uuidv4(),
      type: input.type,
      aggregateId: input.aggregateId,
      aggregateType: input.aggregateType,
      payload: input.payload,
      metadata: {
        correlationId: input.correlationId,
        causationId: input.causationId,
        idempotencyKey: input.idempotencyKey,
        timestamp: new Date().toISOString(),
        source: this.source,
      },
    };

    await this.repository.append(event);
    logger.debug({ eventId: event.id, type: event.type }, 'Event stored');
    return event;
  }

  getByCorrelationId(correlationId: string): Promise<StoredEvent[]> {
    return this.repository.getByCorrelationId(correlationId);
  }

  getByAggregateId(aggregateId: string): Promise<StoredEvent[]> {
    return this.repository.getByAggregateId(aggregateId);
  }
}
