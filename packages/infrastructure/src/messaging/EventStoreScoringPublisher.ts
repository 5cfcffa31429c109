/**
 * @fileoverview Event Store Scoring Publisher (Infrastructure Layer)
 *
 * Implements the ScoringEventPublisher port by appending scoring events to
 * the durable event store. The event id doubles as the idempotency key, so
 * a retried publish of the same event is stored once.
 *
 * @module @pairmatch/infrastructure/messaging/event-store-scoring-publisher
 */

import type { EventStore } from '@pairmatch/core';
import type { ScoringEvent, ScoringEventPublisher } from '@pairmatch/application';

export class EventStoreScoringPublisher implements ScoringEventPublisher {
  constructor(private readonly eventStore: EventStore) {}

  async publish(event: ScoringEvent): Promise<void> {
    await this.eventStore.emit({
      type: event.eventType,
      correlationId: event.correlationId,
      aggregateId: event.aggregateId,
      aggregateType: event.aggregateType,
      payload: { ...event.eventData },
      idempotencyKey: event.eventId,
      ...(event.causationId !== null ? { causationId: event.causationId } : {}),
    });
  }
}
