/**
 * @fileoverview Secondary Port - ScoringEventPublisher
 *
 * Outbound events raised by the scoring service. Publishing is
 * fire-and-forget from the caller's point of view: a failed publish is
 * logged and never fails the scoring call.
 *
 * @module application/ports/secondary/messaging/ScoringEventPublisher
 */

import type { Recommendation, RiskAssessment } from '@pairmatch/types';
import { v4 as uuidv4 } from 'uuid';

export const SCORE_CALCULATED_EVENT = 'compatibility.score_calculated';

export const COMPATIBILITY_SCORE_AGGREGATE = 'CompatibilityScore';

/**
 * Summary carried by `compatibility.score_calculated`. No donor or recipient
 * attributes are included.
 */
export type ScoreCalculatedEventData = {
  readonly donorPairId: string;
  readonly recipientPairId: string;
  readonly overallScore: number;
  readonly confidenceLevel: number;
  readonly riskAssessment: RiskAssessment;
  readonly recommendation: Recommendation;
  readonly calculatedAt: string;
};

export interface ScoringEvent<
  TData extends Readonly<Record<string, unknown>> = Readonly<Record<string, unknown>>,
> {
  readonly eventId: string;
  readonly eventType: string;
  readonly aggregateId: string;
  readonly aggregateType: string;
  readonly correlationId: string;
  readonly causationId: string | null;
  readonly occurredAt: Date;
  readonly eventData: TData;
}

export interface ScoringEventPublisher {
  publish(event: ScoringEvent): Promise<void>;
}

/**
 * Build a scoring event with a fresh id and the current time
 */
export function createScoringEvent<TData extends Readonly<Record<string, unknown>>>(
  eventType: string,
  aggregateId: string,
  eventData: TData,
  correlationId: string,
  causationId?: string
): ScoringEvent<TData> {
  return {
    eventId: uuidv4(),
    eventType,
    aggregateId,
    aggregateType: COMPATIBILITY_SCORE_AGGREGATE,
    correlationId,
    causationId: causationId ?? null,
    occurredAt: new Date(),
    eventData,
  };
}
