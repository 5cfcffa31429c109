/**
 * Inbound donor lifecycle messages
 *
 * Field names follow the registration service's snake_case wire format.
 */
import { z } from 'zod';

import { UUIDSchema } from './common.js';

export const DONOR_REGISTERED_TOPIC = 'donor.registered';

export const DonorRegisteredEventSchema = z.object({
  donor_pair_id: UUIDSchema,
  recipient_pair_id: UUIDSchema,
  donor_blood_type: z.string().min(1),
  recipient_blood_type: z.string().min(1),
  donor_age: z.number().int(),
  recipient_age: z.number().int(),
  donor_gender: z.string().nullish(),
  recipient_gender: z.string().nullish(),
  donor_bmi: z.number().nullish(),
  recipient_bmi: z.number().nullish(),
  donor_latitude: z.number().nullish(),
  donor_longitude: z.number().nullish(),
  recipient_latitude: z.number().nullish(),
  recipient_longitude: z.number().nullish(),
  donor_location: z.string().nullish(),
  recipient_location: z.string().nullish(),
  hla_mismatches: z.number().int().nullish(),
  previous_transplant: z.boolean().nullish(),
  time_on_dialysis: z.number().int().nullish(),
  urgency_level: z.string().nullish(),
  crossmatch_result: z.number().nullish(),
});

export type DonorRegisteredEvent = z.infer<typeof DonorRegisteredEventSchema>;
