/**
 * Liquidity consumption against a hub's order book.
 *
 * Never assume provider arrays are sorted. Levels are filtered and sorted
 * here before they are walked:
 * - buy side: DESCENDING by price (sell into the highest bids first)
 * - sell side: ASCENDING by price (buy the cheapest asks first)
 */

import type { OrderBookEntry } from "../esi/types.js";
import type { ItemValuation } from "./types.js";

export type OrderSide = "buy" | "sell";

/**
 * Result of walking one side of the book.
 */
export interface SideConsumption {
    /** Σ unitsConsumed × price over the consumed levels. */
    total: number;
    filledQuantity: number;
    unmetQuantity: number;
}

/**
 * Orders on one side, optionally limited to one system, best price first.
 */
export function sortedSide(
    orders: readonly OrderBookEntry[],
    side: OrderSide,
    systemId?: number
): OrderBookEntry[] {
    const wantBuy = side === "buy";
    return orders
        .filter((o) => o.isBuySide === wantBuy && (systemId === undefined || o.hubSystemId === systemId))
        .sort((a, b) => (wantBuy ? b.price - a.price : a.price - b.price));
}

/**
 * Walk pre-sorted levels until `quantity` is consumed or the levels run out.
 * Partial fills stay counted in `total`.
 */
export function consumeLevels(levels: readonly OrderBookEntry[], quantity: number): SideConsumption {
    let remaining = quantity;
    let total = 0;

    for (const level of levels) {
        if (remaining <= 0) break;

        const units = Math.min(remaining, level.remainingVolume);
        total += units * level.price;
        remaining -= units;
    }

    return {
        total,
        filledQuantity: quantity - remaining,
        unmetQuantity: remaining,
    };
}

/**
 * Executable buy/sell totals for one item at one hub system.
 *
 * An item with no orders at the hub gets zero totals and unmet = demanded on
 * both sides.
 */
export function consumeLiquidity(
    itemId: number,
    orders: readonly OrderBookEntry[],
    quantity: number,
    hubSystemId: number
): ItemValuation {
    const atHub = orders.filter((o) => o.hubSystemId === hubSystemId);
    const buy = consumeLevels(sortedSide(atHub, "buy"), quantity);
    const sell = consumeLevels(sortedSide(atHub, "sell"), quantity);

    return Object.freeze({
        itemId,
        buyExecutionTotal: buy.total,
        sellExecutionTotal: sell.total,
        demandedQuantity: quantity,
        unmetBuyQuantity: buy.unmetQuantity,
        unmetSellQuantity: sell.unmetQuantity,
    });
}

export interface QuoteOptions {
    /** Units wanted. Omit for the best price only. */
    quantity?: number;
    /** Limit to one system. Omit to use the whole region. */
    systemId?: number;
}

export interface SideQuote {
    /** Unit price, or null when there are no usable orders. */
    price: number | null;
    insufficientStock: boolean;
}

/**
 * Unit price quote for one side of the book.
 *
 * Without a quantity this is the best price. With one it is the average unit
 * price over the consumed levels; when the book runs out first, the average
 * covers only what was filled and `insufficientStock` is set.
 */
export function quoteSide(
    orders: readonly OrderBookEntry[],
    side: OrderSide,
    options: QuoteOptions = {}
): SideQuote {
    if (orders.length === 0) return { price: null, insufficientStock: true };

    const levels = sortedSide(orders, side, options.systemId);
    const best = levels[0];
    if (!best) return { price: null, insufficientStock: true };

    if (options.quantity === undefined) {
        return { price: best.price, insufficientStock: false };
    }

    const consumed = consumeLevels(levels, options.quantity);
    if (consumed.unmetQuantity > 0) {
        return consumed.filledQuantity > 0
            ? { price: consumed.total / consumed.filledQuantity, insufficientStock: true }
            : { price: null, insufficientStock: true };
    }

    if (options.quantity === 0) {
        return { price: best.price, insufficientStock: false };
    }

    return { price: consumed.total / options.quantity, insufficientStock: false };
}

/**
 * Midpoint of best bid and best ask. Falls back to whichever side exists,
 * or 0 when neither does.
 */
export function averagePrice(orders: readonly OrderBookEntry[], systemId?: number): number {
    const buy = quoteSide(orders, "buy", { systemId }).price ?? 0;
    const sell = quoteSide(orders, "sell", { systemId }).price ?? 0;

    if (buy > 0 && sell > 0) return (buy + sell) / 2;
    if (sell > 0) return sell;
    if (buy > 0) return buy;
    return 0;
}
