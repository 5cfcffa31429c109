/**
 * Common schemas shared across the platform
 */
import { z } from 'zod';

/**
 * UUID validation
 */
export const UUIDSchema = z.string().uuid('Invalid UUID format').describe('UUID identifier');

/**
 * ISO 8601 timestamp
 */
export const TimestampSchema = z.string().datetime().describe('ISO 8601 timestamp');

/**
 * Correlation ID for request tracing
 */
export const CorrelationIdSchema = z
  .string()
  .min(1)
  .max(64)
  .describe('Correlation ID for distributed tracing');

export type UUID = z.infer<typeof UUIDSchema>;
export type Timestamp = z.infer<typeof TimestampSchema>;
export type CorrelationId = z.infer<typeof CorrelationIdSchema>;
