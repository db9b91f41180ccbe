import { z } from 'zod';

/**
 * Zod schemas for the upstream market-data API.
 *
 * Ids arrive as strings or numbers; outcome lists sometimes arrive as
 * JSON-encoded strings. Both are normalized here so the rest of the
 * system only sees the domain shapes.
 */

const idSchema = z.union([z.string(), z.number()]).transform(String);

function parseJsonList(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    return value;
  }
}

const stringListSchema = z.preprocess(parseJsonList, z.array(z.string()));

const priceListSchema = z.preprocess(
  parseJsonList,
  z.array(z.union([z.number(), z.string()]).transform(Number)),
);

export const gammaMarketSchema = z.object({
  id: idSchema,
  question: z.string(),
  description: z.string().nullish(),
  outcomes: stringListSchema.optional(),
  outcomePrices: priceListSchema.optional(),
  spread: z.number().nullish(),
  volume24hr: z.number().nullish(),
  active: z.boolean().nullish(),
  closed: z.boolean().nullish(),
});

export const gammaEventSchema = z.object({
  id: idSchema,
  title: z.string(),
  description: z.string().nullish(),
  active: z.boolean().nullish(),
  closed: z.boolean().nullish(),
  archived: z.boolean().nullish(),
  restricted: z.boolean().nullish(),
  markets: z.array(z.object({ id: idSchema })).nullish(),
});

export const gammaMarketListSchema = z.array(gammaMarketSchema);
export const gammaEventListSchema = z.array(gammaEventSchema);

export type GammaMarket = z.infer<typeof gammaMarketSchema>;
export type GammaEvent = z.infer<typeof gammaEventSchema>;
