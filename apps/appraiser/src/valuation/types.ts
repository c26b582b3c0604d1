import type { TradeHub } from "@hub-appraiser/shared";
import type { OrderBookEntry } from "../esi/types.js";

/** One line of a bundle before normalization. itemId may repeat. */
export interface BundleLine {
    itemId: number;
    quantity: number;
}

/** itemId → summed quantity. */
export type DemandMap = Map<number, number>;

/** itemId → orders; an empty list means no orders or a failed fetch. */
export type OrderBookMap = Map<number, readonly OrderBookEntry[]>;

/**
 * Executable totals for one item at one hub.
 *
 * buyExecutionTotal: revenue from selling into standing buy orders.
 * sellExecutionTotal: cost of buying from standing sell orders.
 */
export interface ItemValuation {
    readonly itemId: number;
    readonly buyExecutionTotal: number;
    readonly sellExecutionTotal: number;
    readonly demandedQuantity: number;
    readonly unmetBuyQuantity: number;
    readonly unmetSellQuantity: number;
}

export interface PortfolioValuation {
    readonly totalBuyExecution: number;
    readonly totalSellExecution: number;
    readonly totalMidExecution: number;
    readonly hasInsufficientLiquidity: boolean;
}

/**
 * Aggregated valuation plus which items fell short on each side.
 */
export interface AggregatedValuation extends PortfolioValuation {
    readonly buyShortfallItemIds: readonly number[];
    readonly sellShortfallItemIds: readonly number[];
}

export type ValuationPhase = "idle" | "fetching" | "computing" | "done" | "cancelled";

export type ValuationOutcome =
    | {
        status: "completed";
        /** Totals after the discount. */
        valuation: PortfolioValuation;
        /** Totals before the discount. */
        rawValuation: AggregatedValuation;
        items: readonly ItemValuation[];
        hub: TradeHub;
        /** Effective discount percent, already capped. */
        discountPercent: number;
    }
    | { status: "cancelled" };

export interface FetchProgress {
    completed: number;
    total: number;
    itemId: number;
    failed: boolean;
}
