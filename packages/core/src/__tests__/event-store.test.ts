/**
 * Event Store Tests
 * Tests for durable event persistence and publishing
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockQuery, mockEnd } = vi.hoisted(() => ({
  mockQuery: vi.fn(),
  mockEnd: vi.fn(),
}));

vi.mock('pg', () => ({
  default: {
    Pool: class {
      query = mockQuery;
      end = mockEnd;
    },
  },
}));

import {
  InMemoryEventStore,
  PostgresEventStore,
  EventStore,
  type StoredEvent,
} from '../event-store.js';
import { DatabaseOperationError } from '../errors.js';

const createEvent = (overrides: Partial<StoredEvent> = {}): StoredEvent => ({
  id: 'event-1',
  type: 'compatibility.score_calculated',
  aggregateId: 'score-1',
  aggregateType: 'CompatibilityScore',
  payload: { overallScore: 0.8 },
  metadata: {
    correlationId: 'corr-123',
    causationId: undefined,
    idempotencyKey: 'idem-1',
    timestamp: '2024-03-01T10:00:00.000Z',
    source: 'test',
  },
  ...overrides,
});

describe('InMemoryEventStore', () => {
  let store: InMemoryEventStore;

  beforeEach(() => {
    store = new InMemoryEventStore();
  });

  it('should append events', async () => {
    const event = createEvent();

    await store.append(event);

    expect(await store.getByAggregateId('score-1')).toEqual([event]);
  });

  it('should skip events with a duplicate idempotency key', async () => {
    await store.append(createEvent({ id: 'event-1' }));
    await store.append(createEvent({ id: 'event-2' }));

    expect((await store.getByCorrelationId('corr-123')).map((e) => e.id)).toEqual(['event-1']);
  });

  it('should query by correlation id and aggregate id', async () => {
    await store.append(createEvent());
    await store.append(
      createEvent({
        id: 'event-2',
        aggregateId: 'score-2',
        metadata: { ...createEvent().metadata, idempotencyKey: 'idem-2', correlationId: 'corr-9' },
      })
    );

    expect((await store.getByCorrelationId('corr-123')).map((e) => e.id)).toEqual(['event-1']);
    expect((await store.getByAggregateId('score-2')).map((e) => e.id)).toEqual(['event-2']);
    expect(await store.getByAggregateId('score-3')).toEqual([]);
  });
});

describe('EventStore', () => {
  const emitInput = {
    type: 'compatibility.score_calculated',
    correlationId: 'corr-1',
    idempotencyKey: 'evt-1',
    aggregateId: 'score-1',
    aggregateType: 'CompatibilityScore',
    payload: { overallScore: 0.7 },
  };

  it('should stamp id, timestamp and source onto emitted events', async () => {
    const repository = new InMemoryEventStore();
    const eventStore = new EventStore(repository, { source: 'scoring-service' });

    const event = await eventStore.emit(emitInput);

    expect(event.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Number.isNaN(Date.parse(event.metadata.timestamp))).toBe(false);
    expect(event.metadata).toMatchObject({
      source: 'scoring-service',
      correlationId: 'corr-1',
      causationId: undefined,
      idempotencyKey: 'evt-1',
    });
    expect(await repository.getByAggregateId('score-1')).toEqual([event]);
  });

  it('should record an idempotency key once', async () => {
    const eventStore = new EventStore(new InMemoryEventStore(), { source: 'test' });

    const first = await eventStore.emit(emitInput);
    await eventStore.emit(emitInput);

    expect(await eventStore.getByCorrelationId('corr-1')).toEqual([first]);
  });

  it('should carry the causation id', async () => {
    const eventStore = new EventStore(new InMemoryEventStore(), { source: 'test' });

    const event = await eventStore.emit({ ...emitInput, causationId: 'donor-event-1' });

    expect(event.metadata.causationId).toBe('donor-event-1');
  });

  it('should propagate repository failures', async () => {
    const failing = new InMemoryEventStore();
    vi.spyOn(failing, 'append').mockRejectedValue(new DatabaseOperationError('append', 'down'));
    const eventStore = new EventStore(failing, { source: 'test' });

    await expect(eventStore.emit(emitInput)).rejects.toThrow('Database append failed: down');
  });
});

describe('PostgresEventStore', () => {
  beforeEach(() => {
    mockQuery.mockReset();
    mockEnd.mockReset();
  });

  it('should insert events with ON CONFLICT DO NOTHING', async () => {
    mockQuery.mockResolvedValue({ rows: [] });
    const store = new PostgresEventStore({
      connectionString: 'postgresql://localhost:5432/test',
      tableName: 'test_events',
    });

    await store.append(createEvent());

    const [sql, params] = mockQuery.mock.calls[0] ?? [];
    expect(sql).toContain('INSERT INTO test_events');
    expect(sql).toContain('ON CONFLICT (idempotency_key) DO NOTHING');
    expect(params).toEqual([
      'event-1',
      'compatibility.score_calculated',
      'score-1',
      'CompatibilityScore',
      '{"overallScore":0.8}',
      'corr-123',
      null,
      'idem-1',
      '2024-03-01T10:00:00.000Z',
      'test',
    ]);
  });

  it('should wrap query failures in DatabaseOperationError', async () => {
    mockQuery.mockRejectedValue(new Error('relation does not exist'));
    const store = new PostgresEventStore({ connectionString: 'postgresql://localhost/test' });

    await expect(store.append(createEvent())).rejects.toThrow(DatabaseOperationError);
  });

  it('should map rows back to stored events', async () => {
    mockQuery.mockResolvedValue({
      rows: [
        {
          id: 'event-1',
          type: 'compatibility.score_calculated',
          aggregate_id: null,
          aggregate_type: null,
          payload: { overallScore: 0.8 },
          correlation_id: 'corr-123',
          causation_id: null,
          idempotency_key: 'idem-1',
          timestamp: new Date('2024-03-01T10:00:00.000Z'),
          source: 'test',
        },
      ],
    });
    const store = new PostgresEventStore({ connectionString: 'postgresql://localhost/test' });

    const events = await store.getByCorrelationId('corr-123');

    expect(events).toEqual([
      createEvent({ aggregateId: undefined, aggregateType: undefined }),
    ]);
    expect(mockQuery).toHaveBeenCalledWith(
      'SELECT * FROM domain_events WHERE correlation_id = $1 ORDER BY timestamp ASC',
      ['corr-123']
    );
  });

  it('should wrap read failures in DatabaseOperationError', async () => {
    mockQuery.mockRejectedValue(new Error('connection reset'));
    const store = new PostgresEventStore({ connectionString: 'postgresql://localhost/test' });

    await expect(store.getByAggregateId('score-1')).rejects.toThrow(
      'Database getByAggregateId failed: connection reset'
    );
  });

  it('should close the pool', async () => {
    mockEnd.mockResolvedValue(undefined);
    const store = new PostgresEventStore({ connectionString: 'postgresql://localhost/test' });

    await store.close();

    expect(mockEnd).toHaveBeenCalledTimes(1);
  });
});
