import { describe, it, expect, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';

import { DONOR_PAIR_ID, RECIPIENT_PAIR_ID, buildTestApp } from './helpers.js';

const donorRegistered = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  donor_pair_id: DONOR_PAIR_ID,
  recipient_pair_id: RECIPIENT_PAIR_ID,
  donor_blood_type: 'A+',
  recipient_blood_type: 'B+',
  donor_age: 35,
  recipient_age: 42,
  donor_gender: 'M',
  recipient_gender: 'F',
  hla_mismatches: 2,
  urgency_level: 'HIGH',
  ...overrides,
});

describe('POST /api/v1/scoring/events/donor-registered', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('should score the registered pair and record the event', async () => {
    const testApp = await buildTestApp();
    app = testApp.app;

    const response = await testApp.app.inject({
      method: 'POST',
      url: '/api/v1/scoring/events/donor-registered',
      headers: { 'x-correlation-id': 'corr-donor-1' },
      payload: donorRegistered(),
    });

    expect(response.statusCode).toBe(202);
    const body = JSON.parse(response.body);
    expect(body.status).toBe('scored');
    expect(body.donorPairId).toBe(DONOR_PAIR_ID);
    expect(body.recipientPairId).toBe(RECIPIENT_PAIR_ID);
    expect(body.overallScore).toBeCloseTo(0.812396, 5);
    expect(body.recommendation).toBe('STRONGLY_RECOMMENDED');

    await vi.waitFor(async () => {
      const events = await testApp.eventStore.getByCorrelationId('corr-donor-1');
      expect(events.map((event) => event.type)).toEqual(['compatibility.score_calculated']);
    });
  });

  it('should drop a message missing a required field', async () => {
    const { app: instance } = await buildTestApp();
    app = instance;
    const { donor_age: _donorAge, ...message } = donorRegistered();

    const response = await instance.inject({
      method: 'POST',
      url: '/api/v1/scoring/events/donor-registered',
      payload: message,
    });

    expect(response.statusCode).toBe(202);
    expect(JSON.parse(response.body)).toEqual({
      status: 'dropped',
      reason: 'Invalid donor registration message',
      fields: ['donor_age'],
    });
  });

  it('should skip scoring when auto-scoring is disabled', async () => {
    const { app: instance } = await buildTestApp({ SCORING_AUTO_SCORING_ENABLED: 'false' });
    app = instance;

    const response = await instance.inject({
      method: 'POST',
      url: '/api/v1/scoring/events/donor-registered',
      payload: donorRegistered(),
    });

    expect(response.statusCode).toBe(202);
    expect(JSON.parse(response.body)).toEqual({
      status: 'skipped',
      reason: 'Auto-scoring is disabled',
    });
  });
});
