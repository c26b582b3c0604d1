import { z } from "zod";

/**
 * ESI market order, as returned by GET /markets/{region_id}/orders/.
 */
export const EsiMarketOrderSchema = z.object({
    order_id: z.number().int(),
    type_id: z.number().int(),
    location_id: z.number().int(),
    system_id: z.number().int(),
    is_buy_order: z.boolean(),
    price: z.number().positive(),
    volume_remain: z.number().int().nonnegative(),
    volume_total: z.number().int().nonnegative(),
    min_volume: z.number().int().nonnegative().optional(),
    range: z.string(),
    duration: z.number().int(),
    issued: z.string(),
});

export type EsiMarketOrder = z.infer<typeof EsiMarketOrderSchema>;

export const EsiMarketOrdersPageSchema = z.array(EsiMarketOrderSchema);

/**
 * One resting order at a hub. Immutable once fetched.
 */
export interface OrderBookEntry {
    readonly orderId: number;
    readonly typeId: number;
    readonly locationId: number;
    readonly hubSystemId: number;
    readonly isBuySide: boolean;
    readonly price: number;
    readonly remainingVolume: number;
    readonly volumeTotal: number;
    readonly minVolume: number;
    readonly range: string;
    readonly duration: number;
    readonly issued: string;
}

export function toOrderBookEntry(order: EsiMarketOrder): OrderBookEntry {
    return Object.freeze({
        orderId: order.order_id,
        typeId: order.type_id,
        locationId: order.location_id,
        hubSystemId: order.system_id,
        isBuySide: order.is_buy_order,
        price: order.price,
        remainingVolume: order.volume_remain,
        volumeTotal: order.volume_total,
        minVolume: order.min_volume ?? 1,
        range: order.range,
        duration: order.duration,
        issued: order.issued,
    });
}

/**
 * Source of market orders for one item in one region.
 * Implementations may cache; `forceRefresh` must bypass any cached copy.
 */
export interface MarketDataProvider {
    fetchOrderBook(
        itemId: number,
        regionId: number,
        forceRefresh: boolean,
        signal?: AbortSignal
    ): Promise<readonly OrderBookEntry[]>;
}
