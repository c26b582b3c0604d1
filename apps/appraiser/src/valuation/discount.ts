/**
 * Discount applied to valuation totals before display.
 *
 * The user types a whole percentage (1-99999). The effective multiplier is
 * min(cap, percent) / 100. Order consumption never sees the discount.
 */

import { z } from "zod";
import {
    DEFAULT_DISCOUNT_PERCENT,
    MAX_DISCOUNT_PERCENT,
} from "@hub-appraiser/shared";
import type { PortfolioValuation } from "./types.js";

/** Digits only, at most five, strictly positive. */
export const DiscountInputSchema = z
    .string()
    .regex(/^\d{1,5}$/)
    .transform((raw) => Number.parseInt(raw, 10))
    .refine((percent) => percent > 0);

/**
 * Parse a typed discount. Returns null on anything that is not 1-99999.
 */
export function parseDiscountInput(raw: string): number | null {
    const result = DiscountInputSchema.safeParse(raw.trim());
    return result.success ? result.data : null;
}

export function effectiveDiscountPercent(percent: number, capPercent: number = MAX_DISCOUNT_PERCENT): number {
    return Math.min(capPercent, percent);
}

export function discountMultiplier(percent: number, capPercent: number = MAX_DISCOUNT_PERCENT): number {
    return effectiveDiscountPercent(percent, capPercent) / 100;
}

/**
 * Scale the three totals. The liquidity flag passes through unchanged.
 */
export function applyDiscount(
    valuation: PortfolioValuation,
    percent: number,
    capPercent: number = MAX_DISCOUNT_PERCENT
): PortfolioValuation {
    const multiplier = discountMultiplier(percent, capPercent);
    return {
        totalBuyExecution: valuation.totalBuyExecution * multiplier,
        totalSellExecution: valuation.totalSellExecution * multiplier,
        totalMidExecution: valuation.totalMidExecution * multiplier,
        hasInsufficientLiquidity: valuation.hasInsufficientLiquidity,
    };
}

/**
 * Last accepted discount. Invalid submissions leave it untouched.
 */
export class DiscountSetting {
    private percent: number;

    constructor(
        readonly capPercent: number = MAX_DISCOUNT_PERCENT,
        initialPercent: number = DEFAULT_DISCOUNT_PERCENT
    ) {
        this.percent = initialPercent;
    }

    /**
     * Accept `raw` if valid. Returns false (and keeps the old value) otherwise.
     */
    submit(raw: string): boolean {
        const parsed = parseDiscountInput(raw);
        if (parsed === null) return false;
        this.percent = parsed;
        return true;
    }

    /** As entered, uncapped. */
    get requestedPercent(): number {
        return this.percent;
    }

    get effectivePercent(): number {
        return effectiveDiscountPercent(this.percent, this.capPercent);
    }

    get multiplier(): number {
        return this.effectivePercent / 100;
    }

    apply(valuation: PortfolioValuation): PortfolioValuation {
        return applyDiscount(valuation, this.percent, this.capPercent);
    }
}
