import type { FastifyInstance } from 'fastify';
import {
  createCompatibilityScoringService,
  createDonorRegistrationHandler,
  type CompatibilityScoringUseCase,
} from '@pairmatch/application';
import type { EventStore } from '@pairmatch/core';
import { createScoringAdapters } from '@pairmatch/infrastructure';
import type { ScoringRequest } from '@pairmatch/types';

import { buildApp } from '../app.js';
import { loadConfig } from '../config.js';

export const FIXED_NOW = new Date('2024-03-01T10:00:00.000Z');
export const DONOR_PAIR_ID = '6f1c2a44-1d2b-4c3e-9f10-2a3b4c5d6e7f';
export const RECIPIENT_PAIR_ID = '0b7e9d21-5c4a-4e8f-8a1b-9c2d3e4f5a6b';
export const OTHER_RECIPIENT_PAIR_ID = '3c4d5e6f-7a8b-4c9d-8e0f-1a2b3c4d5e6f';

export function buildScoringRequest(overrides: Partial<ScoringRequest> = {}): ScoringRequest {
  return {
    donorPairId: DONOR_PAIR_ID,
    recipientPairId: RECIPIENT_PAIR_ID,
    donor: { bloodType: 'A+', age: 35, sex: 'M' },
    recipient: { bloodType: 'B+', age: 42, sex: 'F' },
    clinical: { hlaMismatches: 2, urgency: 'HIGH' },
    scoring: { method: 'HYBRID' },
    ...overrides,
  };
}

export interface TestApp {
  app: FastifyInstance;
  eventStore: EventStore;
}

/**
 * App wired to the real service over in-memory adapters
 */
export async function buildTestApp(
  env: Record<string, string | undefined> = {}
): Promise<TestApp> {
  const config = loadConfig({
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    SCORING_MAX_BATCH_SIZE: '3',
    ...env,
  });
  const { repository, publisher, eventStore } = createScoringAdapters({ source: 'test-scoring' });
  const scoring = createCompatibilityScoringService(
    { repository, publisher },
    {
      cacheEnabled: config.scoring.cacheEnabled,
      maxBatchSize: config.scoring.maxBatchSize,
      serviceName: config.service.name,
    }
  );
  const donorRegistration = createDonorRegistrationHandler(scoring, {
    autoScoringEnabled: config.scoring.autoScoringEnabled,
  });

  const app = await buildApp({
    config,
    scoring,
    donorRegistration,
    logger: false,
    clock: () => FIXED_NOW,
  });
  await app.ready();
  return { app, eventStore };
}

/**
 * App around a caller-supplied scoring use case
 */
export async function buildAppWithScoring(
  scoring: CompatibilityScoringUseCase
): Promise<FastifyInstance> {
  const config = loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'silent' });
  const app = await buildApp({
    config,
    scoring,
    donorRegistration: createDonorRegistrationHandler(scoring, { autoScoringEnabled: true }),
    logger: false,
  });
  await app.ready();
  return app;
}
