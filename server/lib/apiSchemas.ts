/**
 * Zod schemas for Capital.com REST responses.
 *
 * These validate the shape of JSON payloads at the system boundary before
 * they propagate into the rest of the application. Objects are
 * passthrough: the provider adds fields freely.
 */

import { z } from 'zod';

const optionalNumber = z.number().nullable().optional();

// ---------------------------------------------------------------------------
// Error body  ({ "errorCode": "error.invalid.details" })
// ---------------------------------------------------------------------------

export const ErrorBodySchema = z.object({ errorCode: z.string() }).passthrough();

// ---------------------------------------------------------------------------
// Market navigation  (/api/v1/marketnavigation/{nodeId})
// ---------------------------------------------------------------------------

const NavigationMarketSchema = z
  .object({
    epic: z.string().min(1),
    instrumentName: z.string().optional(),
    instrumentType: z.string().optional(),
    marketStatus: z.string().optional(),
    bid: optionalNumber,
    offer: optionalNumber,
    percentageChange: optionalNumber,
  })
  .passthrough();

const NavigationNodeSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
  })
  .passthrough();

export const MarketNavigationResponseSchema = z
  .object({
    nodes: z.array(NavigationNodeSchema).nullable().optional(),
    markets: z.array(NavigationMarketSchema).nullable().optional(),
  })
  .passthrough();

export type MarketNavigationResponse = z.infer<typeof MarketNavigationResponseSchema>;

// ---------------------------------------------------------------------------
// Market details  (/api/v1/markets/{epic})
// ---------------------------------------------------------------------------

export const MarketDetailsResponseSchema = z
  .object({
    instrument: z
      .object({
        epic: z.string().optional(),
        name: z.string().optional(),
        type: z.string().optional(),
        currency: z.string().optional(),
      })
      .passthrough(),
    snapshot: z
      .object({
        bid: optionalNumber,
        offer: optionalNumber,
        percentageChange: optionalNumber,
        marketStatus: z.string().optional(),
        updateTime: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type MarketDetailsResponse = z.infer<typeof MarketDetailsResponseSchema>;

// ---------------------------------------------------------------------------
// Historical prices  (/api/v1/prices/{epic})
// ---------------------------------------------------------------------------

const BidAskSchema = z
  .object({
    bid: optionalNumber,
    ask: optionalNumber,
  })
  .passthrough();

const PriceBarSchema = z
  .object({
    snapshotTime: z.string().optional(),
    snapshotTimeUTC: z.string().optional(),
    openPrice: BidAskSchema.optional(),
    closePrice: BidAskSchema.optional(),
    highPrice: BidAskSchema.optional(),
    lowPrice: BidAskSchema.optional(),
    lastTradedVolume: optionalNumber,
  })
  .passthrough();

export const PricesResponseSchema = z
  .object({
    prices: z.array(PriceBarSchema).default([]),
    instrumentType: z.string().optional(),
  })
  .passthrough();

export type PricesResponse = z.infer<typeof PricesResponseSchema>;
export type PriceBar = PricesResponse['prices'][number];

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON payload against a Zod schema.
 * Returns the validated data on success, or `null` on failure (with a
 * warning through `warn`). Callers decide whether `null` is fatal.
 */
export function validateApiResponse<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  label: string,
  warn: (details: Record<string, unknown>, message: string) => void,
): z.output<S> | null {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  warn({ issues: result.error.issues.slice(0, 3) }, `[zod] ${label}: API response failed validation`);
  return null;
}
