/**
 * Request schemas shared by the scoring routes
 */

import { z } from 'zod';
import { validationErrorFromZod } from '@pairmatch/core';
import { ScoringRequestSchema, UUIDSchema } from '@pairmatch/types';

export const PairParamsSchema = z.object({
  donorPairId: UUIDSchema,
  recipientPairId: UUIDSchema,
});

export const DonorPairParamsSchema = z.object({ donorPairId: UUIDSchema });

export const RecipientPairParamsSchema = z.object({ recipientPairId: UUIDSchema });

/**
 * Batch bodies are a plain JSON array of scoring requests
 */
export const BatchBodySchema = z.array(ScoringRequestSchema);

/**
 * Parse a request part, converting zod failures into a ValidationError
 */
export function parseInput<TOutput>(
  schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>,
  value: unknown,
  message: string
): TOutput {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw validationErrorFromZod(message, result.error);
  }
  return result.data;
}
