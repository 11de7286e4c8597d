import { z } from 'zod';

export const DEFAULT_CAPACITY = 64;
export const DEFAULT_OFFER_TIMEOUT_MS = 50;
export const DEFAULT_POLL_TIMEOUT_MS = 5_000;

/**
 * Zod schema for the logger's tunables.
 *
 * - `offerTimeoutMs` bounds how long a submission waits for room before
 *   the event is dropped.
 * - `pollTimeoutMs` is the idle period after which the consumer retires.
 * - `logDir` overrides the platform log directory.
 */
export const resolverLoggerOptionsSchema = z.object({
  capacity: z.number().int().positive().default(DEFAULT_CAPACITY),
  offerTimeoutMs: z.number().int().nonnegative().default(DEFAULT_OFFER_TIMEOUT_MS),
  pollTimeoutMs: z.number().int().positive().default(DEFAULT_POLL_TIMEOUT_MS),
  logDir: z.string().min(1).optional(),
});

/** Options as callers pass them; every field is optional. */
export type ResolverLoggerOptionsInput = z.input<typeof resolverLoggerOptionsSchema>;

/** Options with defaults applied. */
export type ResolverLoggerOptions = z.infer<typeof resolverLoggerOptionsSchema>;

/** Throws a `ZodError` listing every invalid field. */
export function parseResolverLoggerOptions(input: ResolverLoggerOptionsInput = {}): ResolverLoggerOptions {
  return resolverLoggerOptionsSchema.parse(input);
}
