import { z } from "zod";

/**
 * Upper bound on the discount percentage a user may enter.
 * Five digits, matching the input field limit.
 */
export const MAX_DISCOUNT_PERCENT = 99_999;

/** Discount applied when the user has not chosen one (no discount). */
export const DEFAULT_DISCOUNT_PERCENT = 100;

/** Never more than this many order book requests in flight per valuation. */
export const DEFAULT_MAX_CONCURRENCY = 10;

/** Market orders are reused for this long unless a refresh is forced (3 hours). */
export const DEFAULT_MARKET_CACHE_TTL_MS = 3 * 60 * 60 * 1000;

/**
 * Valuation engine settings.
 * Every field has a default so `ValuationSettingsSchema.parse({})` is valid.
 */
export const ValuationSettingsSchema = z.object({
    /** Max concurrent order book fetches (default: 10) */
    maxConcurrency: z.number().int().min(1).default(DEFAULT_MAX_CONCURRENCY),
    /** Discount cap in percent; the effective discount is min(cap, requested) */
    discountCapPercent: z
        .number()
        .int()
        .min(1)
        .max(MAX_DISCOUNT_PERCENT)
        .default(MAX_DISCOUNT_PERCENT),
    /** Discount used when the request does not carry one */
    defaultDiscountPercent: z
        .number()
        .int()
        .min(1)
        .max(MAX_DISCOUNT_PERCENT)
        .default(DEFAULT_DISCOUNT_PERCENT),
    /** Bypass the market order cache for every fetch */
    forceRefresh: z.boolean().default(false),
});

export type ValuationSettings = z.infer<typeof ValuationSettingsSchema>;
export type ValuationSettingsInput = z.input<typeof ValuationSettingsSchema>;

/**
 * Parse settings, filling in defaults.
 * Throws a ZodError on invalid values.
 */
export function parseValuationSettings(input: ValuationSettingsInput = {}): ValuationSettings {
    return ValuationSettingsSchema.parse(input);
}
