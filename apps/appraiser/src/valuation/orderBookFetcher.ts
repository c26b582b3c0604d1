/**
 * Order book fetcher.
 *
 * Fetches one order book per distinct item under a bounded worker pool:
 * `concurrency` fetches are started up front and each completion starts the
 * next pending item, so exactly `concurrency` stay in flight until the queue
 * drains.
 *
 * Fetch tasks never write shared state. They resolve with their result and
 * the coordinating loop below is the only writer of the result map.
 */

import { DEFAULT_MAX_CONCURRENCY } from "@hub-appraiser/shared";
import { createChildLogger, type Logger } from "../log/logger.js";
import type { MarketDataProvider, OrderBookEntry } from "../esi/types.js";
import { ValuationCancelledError } from "./errors.js";
import type { FetchProgress, OrderBookMap } from "./types.js";

const defaultLogger = createChildLogger({ module: "order-book-fetcher" });

export interface FetchOrderBooksOptions {
    provider: MarketDataProvider;
    regionId: number;
    forceRefresh?: boolean;
    /** Upper bound on in-flight fetches. Default: 10 */
    maxConcurrency?: number;
    signal?: AbortSignal;
    /** Called by the coordinator after each fetch settles. */
    onProgress?: (progress: FetchProgress) => void;
    logger?: Logger;
}

/**
 * Result of one fetch task. Failures are folded into an empty book.
 */
interface FetchSettled {
    itemId: number;
    orders: readonly OrderBookEntry[];
    failed: boolean;
}

/**
 * min(maxConcurrency, itemCount), never below 1.
 */
export function resolveConcurrency(
    itemCount: number,
    maxConcurrency: number = DEFAULT_MAX_CONCURRENCY
): number {
    return Math.max(1, Math.min(maxConcurrency, itemCount));
}

/**
 * Fetch order books for every distinct item.
 *
 * Resolves only after every fetch has settled. A failed fetch is logged and
 * recorded as an empty book; it never fails the batch.
 *
 * @throws ValuationCancelledError when `signal` aborts. In-flight fetches are
 * awaited first so nothing keeps running after the rejection.
 */
export async function fetchOrderBooks(
    itemIds: Iterable<number>,
    options: FetchOrderBooksOptions
): Promise<OrderBookMap> {
    const { provider, regionId, forceRefresh = false, signal, onProgress } = options;
    const log = (options.logger ?? defaultLogger).child({ regionId });

    if (signal?.aborted) {
        throw new ValuationCancelledError();
    }

    const pending = [...new Set(itemIds)];
    const total = pending.length;
    const books: OrderBookMap = new Map();

    if (total === 0) {
        return books;
    }

    const concurrency = resolveConcurrency(total, options.maxConcurrency);
    const startedAt = Date.now();
    log.info({ itemCount: total, concurrency, forceRefresh }, "Loading order books");

    const fetchOne = async (itemId: number): Promise<FetchSettled> => {
        try {
            const orders = await provider.fetchOrderBook(itemId, regionId, forceRefresh, signal);
            return { itemId, orders, failed: false };
        } catch (err) {
            if (signal?.aborted) {
                log.debug({ itemId }, "Order book fetch aborted");
            } else {
                log.warn({ err, itemId }, "Order book fetch failed, using empty book");
            }
            return { itemId, orders: [], failed: true };
        }
    };

    const inFlight = new Map<number, Promise<FetchSettled>>();
    const launchNext = (): void => {
        const itemId = pending.shift();
        if (itemId !== undefined) {
            inFlight.set(itemId, fetchOne(itemId));
        }
    };

    for (let i = 0; i < concurrency; i++) {
        launchNext();
    }

    let completed = 0;
    let failedCount = 0;

    while (inFlight.size > 0) {
        const settled = await Promise.race(inFlight.values());
        inFlight.delete(settled.itemId);

        if (signal?.aborted) {
            // fetchOne never rejects, so this only waits for the rest to wind down
            await Promise.all(inFlight.values());
            log.info({ completed, itemCount: total }, "Order book loading cancelled");
            throw new ValuationCancelledError();
        }

        books.set(settled.itemId, settled.orders);
        completed++;
        if (settled.failed) failedCount++;
        try {
            onProgress?.({ completed, total, itemId: settled.itemId, failed: settled.failed });
        } catch (err) {
            log.warn({ err, itemId: settled.itemId }, "Progress callback threw");
        }

        if (!signal?.aborted) {
            launchNext();
        }
    }

    log.info(
        {
            itemCount: total,
            succeeded: total - failedCount,
            failed: failedCount,
            durationMs: Date.now() - startedAt,
        },
        "Order books loaded"
    );

    return books;
}
