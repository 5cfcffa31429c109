/**
 * @fileoverview Adapter wiring for the scoring service
 *
 * Picks PostgreSQL adapters when a database URL is configured and the
 * in-memory ones otherwise. Both the score table and the event store share
 * one connection pool.
 *
 * @module @pairmatch/infrastructure/adapters
 */

import pg from 'pg';
import { EventStore, InMemoryEventStore, PostgresEventStore, createLogger } from '@pairmatch/core';
import type { CompatibilityScoreRepository, ScoringEventPublisher } from '@pairmatch/application';

import { EventStoreScoringPublisher } from './messaging/EventStoreScoringPublisher.js';
import { InMemoryCompatibilityScoreRepository } from './repositories/InMemoryCompatibilityScoreRepository.js';
import { PostgresCompatibilityScoreRepository } from './repositories/PostgresCompatibilityScoreRepository.js';

const logger = createLogger({ name: 'scoring-adapters' });

export interface ScoringAdapterOptions {
  /** Event source name stamped on stored events */
  source: string;
  databaseUrl?: string | undefined;
  maxConnections?: number;
}

export interface ScoringAdapters {
  repository: CompatibilityScoreRepository;
  publisher: ScoringEventPublisher;
  eventStore: EventStore;
  /** Whether the adapters are backed by PostgreSQL */
  persistent: boolean;
  close(): Promise<void>;
}

export function createScoringAdapters(options: ScoringAdapterOptions): ScoringAdapters {
  if (!options.databaseUrl) {
    logger.warn('DATABASE_URL not set, scores and events are kept in memory');
    const eventStore = new EventStore(new InMemoryEventStore(), { source: options.source });
    return {
      repository: new InMemoryCompatibilityScoreRepository(),
      publisher: new EventStoreScoringPublisher(eventStore),
      eventStore,
      persistent: false,
      close: () => Promise.resolve(),
    };
  }

  const pool = new pg.Pool({
    connectionString: options.databaseUrl,
    max: options.maxConnections ?? 10,
  });
  const eventStore = new EventStore(
    new PostgresEventStore({ connectionString: options.databaseUrl, pool }),
    { source: options.source }
  );

  return {
    repository: new PostgresCompatibilityScoreRepository({
      connectionString: options.databaseUrl,
      pool,
    }),
    publisher: new EventStoreScoringPublisher(eventStore),
    eventStore,
    persistent: true,
    close: () => pool.end(),
  };
}
