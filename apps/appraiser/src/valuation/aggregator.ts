import type { AggregatedValuation, ItemValuation } from "./types.js";

/**
 * Sum per-item valuations into portfolio totals.
 *
 * Both shortfall lists are always computed; which one matters depends on
 * whether the caller reports selling to the market or buying from it.
 */
export function aggregateValuations(items: Iterable<ItemValuation>): AggregatedValuation {
    let totalBuyExecution = 0;
    let totalSellExecution = 0;
    const buyShortfallItemIds: number[] = [];
    const sellShortfallItemIds: number[] = [];

    for (const item of items) {
        totalBuyExecution += item.buyExecutionTotal;
        totalSellExecution += item.sellExecutionTotal;
        if (item.unmetBuyQuantity > 0) buyShortfallItemIds.push(item.itemId);
        if (item.unmetSellQuantity > 0) sellShortfallItemIds.push(item.itemId);
    }

    return {
        totalBuyExecution,
        totalSellExecution,
        totalMidExecution: (totalBuyExecution + totalSellExecution) / 2,
        hasInsufficientLiquidity: buyShortfallItemIds.length > 0 || sellShortfallItemIds.length > 0,
        buyShortfallItemIds,
        sellShortfallItemIds,
    };
}
