import { z } from 'zod';

/**
 * Validation schema for POST /chat request body
 */
export const ChatRequestSchema = z.object({
    message: z.string(),
});

/**
 * Validation schema for the availability file
 *
 * Two levels of string keys, leaves must be non-negative integers.
 * Nothing is coerced: "3" or 2.5 reject the whole file.
 */
export const AvailabilityScheduleSchema = z.record(
    z.string(),
    z.record(z.string(), z.number().int().nonnegative())
);
