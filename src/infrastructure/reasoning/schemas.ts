import { z } from 'zod';

/** Domain-shaped candidates as exchanged with the reasoning service. */
export const feedEventSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().optional(),
  markets: z.array(z.string()).default([]),
});

export const feedMarketSchema = z.object({
  id: z.string(),
  question: z.string(),
  description: z.string().optional(),
  outcomes: z.array(z.string()).default([]),
  outcome_prices: z.array(z.number()).default([]),
  spread: z.number().optional(),
  volume_24hr: z.number().optional(),
});

/** Filters may answer with free text or nothing instead of a list. */
export const eventFilterResultSchema = z.union([z.array(feedEventSchema), z.string(), z.null()]);
export const marketFilterResultSchema = z.union([z.array(feedMarketSchema), z.string(), z.null()]);

/**
 * Envelope around every reasoning-service answer. `result` is validated
 * separately against the schema of the operation that was called.
 */
export const reasoningEnvelopeSchema = z.object({
  result: z.unknown(),
  model: z.string().nullish(),
  tokens_used: z.number().int().nonnegative().nullish(),
});
