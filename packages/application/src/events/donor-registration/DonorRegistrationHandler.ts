/**
 * @fileoverview Donor Registration Handler
 *
 * Consumes `donor.registered` messages and scores the newly registered pair.
 * Messages missing a required field are dropped with a warning; the scoring
 * engine is only ever called with a validated request.
 *
 * @module application/events/donor-registration/DonorRegistrationHandler
 */

import {
  ValidationError,
  createLogger,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from '@pairmatch/core';
import { parseScoringRequest } from '@pairmatch/domain';
import {
  DonorRegisteredEventSchema,
  type DonorRegisteredEvent,
  type Recommendation,
  type ScoringRequest,
  type ScoringRequestInput,
} from '@pairmatch/types';

import type { CompatibilityScoringUseCase } from '../../ports/primary/CompatibilityScoringUseCase.js';

const logger = createLogger({ name: 'DonorRegistrationHandler' });

export type DonorRegistrationOutcome =
  | {
      readonly status: 'scored';
      readonly scoreId: string;
      readonly donorPairId: string;
      readonly recipientPairId: string;
      readonly overallScore: number;
      readonly recommendation: Recommendation;
    }
  | {
      readonly status: 'dropped';
      readonly reason: string;
      /** Names of the offending fields; values are never echoed */
      readonly fields: readonly string[];
    }
  | {
      readonly status: 'failed';
      readonly donorPairId: string;
      readonly recipientPairId: string;
      readonly error: SafeErrorDetails;
    }
  | { readonly status: 'skipped'; readonly reason: string };

export interface DonorRegistrationHandlerOptions {
  /** When false every message is acknowledged without scoring */
  autoScoringEnabled: boolean;
}

/**
 * Map the snake_case wire message onto a scoring request
 */
export function toScoringRequest(event: DonorRegisteredEvent): ScoringRequestInput {
  return {
    donorPairId: event.donor_pair_id,
    recipientPairId: event.recipient_pair_id,
    donor: {
      bloodType: event.donor_blood_type,
      age: event.donor_age,
      sex: event.donor_gender,
      bmi: event.donor_bmi,
      latitude: event.donor_latitude,
      longitude: event.donor_longitude,
      location: event.donor_location,
    },
    recipient: {
      bloodType: event.recipient_blood_type,
      age: event.recipient_age,
      sex: event.recipient_gender,
      bmi: event.recipient_bmi,
      latitude: event.recipient_latitude,
      longitude: event.recipient_longitude,
      location: event.recipient_location,
    },
    clinical: {
      hlaMismatches: event.hla_mismatches,
      previousTransplant: event.previous_transplant,
      monthsOnDialysis: event.time_on_dialysis,
      urgency: event.urgency_level,
      crossmatchResult: event.crossmatch_result,
    },
  };
}

function fieldNames(details: unknown): string[] {
  if (typeof details !== 'object' || details === null || !('fieldErrors' in details)) {
    return [];
  }
  const { fieldErrors } = details;
  return typeof fieldErrors === 'object' && fieldErrors !== null ? Object.keys(fieldErrors) : [];
}

export class DonorRegistrationHandler {
  constructor(
    private readonly scoring: CompatibilityScoringUseCase,
    private readonly options: DonorRegistrationHandlerOptions
  ) {}

  async handle(message: unknown, correlationId: string): Promise<DonorRegistrationOutcome> {
    if (!this.options.autoScoringEnabled) {
      logger.debug({ correlationId }, 'Auto-scoring disabled, ignoring donor registration');
      return { status: 'skipped', reason: 'Auto-scoring is disabled' };
    }

    const parsedEvent = DonorRegisteredEventSchema.safeParse(message);
    if (!parsedEvent.success) {
      const fields = Object.keys(parsedEvent.error.flatten().fieldErrors);
      logger.warn({ correlationId, fields }, 'Dropping donor registration with invalid fields');
      return { status: 'dropped', reason: 'Invalid donor registration message', fields };
    }

    let request: ScoringRequest;
    try {
      request = parseScoringRequest(toScoringRequest(parsedEvent.data));
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      const fields = fieldNames(error.details);
      logger.warn(
        { correlationId, fields, donorPairId: parsedEvent.data.donor_pair_id },
        'Dropping donor registration that does not form a valid scoring request'
      );
      return { status: 'dropped', reason: error.message, fields };
    }

    const { donorPairId, recipientPairId } = request;

    try {
      const score = await this.scoring.calculate(request, correlationId);
      logger.info(
        { donorPairId, recipientPairId, scoreId: score.scoreId, correlationId },
        'Scored newly registered pair'
      );
      return {
        status: 'scored',
        scoreId: score.scoreId,
        donorPairId,
        recipientPairId,
        overallScore: score.overallScore,
        recommendation: score.recommendation,
      };
    } catch (error) {
      logger.error(
        { err: error, donorPairId, recipientPairId, correlationId },
        'Failed to score newly registered pair'
      );
      return {
        status: 'failed',
        donorPairId,
        recipientPairId,
        error: toSafeErrorResponse(error),
      };
    }
  }
}

export function createDonorRegistrationHandler(
  scoring: CompatibilityScoringUseCase,
  options: DonorRegistrationHandlerOptions
): DonorRegistrationHandler {
  return new DonorRegistrationHandler(scoring, options);
}
