/**
 * Tests for AppraisalEngine.
 *
 * The engine runs against an in-process provider keyed by item ID.
 */

import { describe, it, expect, vi } from "vitest";
import { createChildLogger } from "../log/logger.js";
import { HubResolutionError, TRADE_HUBS } from "@hub-appraiser/shared";
import type { OrderBookEntry } from "../esi/types.js";
import { AppraisalEngine, type OwnedMarketDataProvider } from "./engine.js";
import { InvalidBundleError, InvalidDiscountError } from "./errors.js";
import type { ValuationOutcome } from "./types.js";

const JITA = TRADE_HUBS.Jita;
const AMARR = TRADE_HUBS.Amarr;

const TRITANIUM = 34; // full liquidity
const PYERITE = 35; // no orders

let nextOrderId = 1;

function makeOrder(
    typeId: number,
    price: number,
    remainingVolume: number,
    isBuySide: boolean,
    hubSystemId: number = JITA.systemId
): OrderBookEntry {
    return {
        orderId: nextOrderId++,
        typeId,
        locationId: 60003760,
        hubSystemId,
        isBuySide,
        price,
        remainingVolume,
        volumeTotal: remainingVolume,
        minVolume: 1,
        range: "region",
        duration: 90,
        issued: "2026-01-01T00:00:00Z",
    };
}

/**
 * Provider backed by a fixed map. Unknown items resolve with no orders.
 */
function createFakeProvider(
    books: Record<number, OrderBookEntry[]>,
    options: { delayMs?: number; failIds?: number[] } = {}
) {
    const fetchOrderBook = vi.fn(
        (itemId: number, _regionId: number, _forceRefresh: boolean, signal?: AbortSignal) =>
            new Promise<readonly OrderBookEntry[]>((resolve, reject) => {
                const timer = setTimeout(() => {
                    if (options.failIds?.includes(itemId)) {
                        reject(new Error("ESI error 504: Gateway Timeout"));
                    } else {
                        resolve(books[itemId] ?? []);
                    }
                }, options.delayMs ?? 0);

                signal?.addEventListener(
                    "abort",
                    () => {
                        clearTimeout(timer);
                        reject(new Error("This operation was aborted"));
                    },
                    { once: true }
                );
            })
    );
    const close = vi.fn(async () => {});
    const provider: OwnedMarketDataProvider = { fetchOrderBook, close };
    return { provider, fetchOrderBook, close };
}

const defaultBooks: Record<number, OrderBookEntry[]> = {
    [TRITANIUM]: [
        makeOrder(TRITANIUM, 100, 10, true), // buy total 1000
        makeOrder(TRITANIUM, 120, 10, false), // sell total 1200
        makeOrder(TRITANIUM, 1, 1000, false, AMARR.systemId), // other hub, ignored
    ],
};

function expectCompleted(outcome: ValuationOutcome) {
    if (outcome.status !== "completed") {
        throw new Error(`Expected a completed valuation, got ${outcome.status}`);
    }
    return outcome;
}

describe("AppraisalEngine.valuate", () => {
    it("values a bundle with one unfilled item", async () => {
        const { provider } = createFakeProvider(defaultBooks);
        const engine = new AppraisalEngine({ provider });

        const outcome = expectCompleted(
            await engine.valuate(
                [
                    { itemId: TRITANIUM, quantity: 10 },
                    { itemId: PYERITE, quantity: 5 },
                ],
                JITA
            )
        );

        expect(outcome.valuation).toEqual({
            totalBuyExecution: 1000,
            totalSellExecution: 1200,
            totalMidExecution: 1100,
            hasInsufficientLiquidity: true,
        });
        expect(outcome.rawValuation.buyShortfallItemIds).toEqual([PYERITE]);
        expect(outcome.rawValuation.sellShortfallItemIds).toEqual([PYERITE]);
        expect(outcome.items).toHaveLength(2);
        expect(outcome.discountPercent).toBe(100);
        expect(outcome.hub).toEqual(JITA);
    });

    it("reports sufficient liquidity when every item fills", async () => {
        const { provider } = createFakeProvider(defaultBooks);
        const engine = new AppraisalEngine({ provider });

        const outcome = expectCompleted(
            await engine.valuate([{ itemId: TRITANIUM, quantity: 10 }], "Jita")
        );

        expect(outcome.valuation.hasInsufficientLiquidity).toBe(false);
    });

    it("fetches the hub's region and merges duplicate lines", async () => {
        const { provider, fetchOrderBook } = createFakeProvider(defaultBooks);
        const engine = new AppraisalEngine({ provider });

        const outcome = expectCompleted(
            await engine.valuate(
                [
                    { itemId: TRITANIUM, quantity: 4 },
                    { itemId: TRITANIUM, quantity: 6 },
                ],
                "system_id:30000142"
            )
        );

        expect(fetchOrderBook).toHaveBeenCalledTimes(1);
        expect(fetchOrderBook).toHaveBeenCalledWith(TRITANIUM, JITA.regionId, false, undefined);
        expect(outcome.items[0]?.demandedQuantity).toBe(10);
        expect(outcome.valuation.totalBuyExecution).toBe(1000);
    });

    it("applies the discount to displayed totals only", async () => {
        const { provider } = createFakeProvider(defaultBooks);
        const engine = new AppraisalEngine({ provider });

        const outcome = expectCompleted(
            await engine.valuate([{ itemId: TRITANIUM, quantity: 10 }], JITA, 50)
        );

        expect(outcome.valuation.totalBuyExecution).toBe(500);
        expect(outcome.valuation.totalSellExecution).toBe(600);
        expect(outcome.valuation.totalMidExecution).toBe(550);
        expect(outcome.rawValuation.totalBuyExecution).toBe(1000);
        expect(outcome.items[0]?.buyExecutionTotal).toBe(1000);
    });

    it("caps the discount at the configured cap", async () => {
        const { provider } = createFakeProvider(defaultBooks);
        const engine = new AppraisalEngine({ provider, settings: { discountCapPercent: 80 } });

        const outcome = expectCompleted(
            await engine.valuate([{ itemId: TRITANIUM, quantity: 10 }], JITA, 90)
        );

        expect(outcome.discountPercent).toBe(80);
        expect(outcome.valuation.totalBuyExecution).toBeCloseTo(800, 9);
    });

    it("degrades a failed fetch to an empty book", async () => {
        const { provider } = createFakeProvider(defaultBooks, { failIds: [TRITANIUM] });
        const engine = new AppraisalEngine({ provider });

        const outcome = expectCompleted(
            await engine.valuate([{ itemId: TRITANIUM, quantity: 10 }], JITA)
        );

        expect(outcome.valuation.totalBuyExecution).toBe(0);
        expect(outcome.valuation.hasInsufficientLiquidity).toBe(true);
        expect(outcome.items[0]?.unmetBuyQuantity).toBe(10);
    });

    it("skips fetching zero-quantity items but still reports them", async () => {
        const { provider, fetchOrderBook } = createFakeProvider(defaultBooks);
        const engine = new AppraisalEngine({ provider });

        const outcome = expectCompleted(
            await engine.valuate([{ itemId: PYERITE, quantity: 0 }], JITA)
        );

        expect(fetchOrderBook).not.toHaveBeenCalled();
        expect(outcome.items).toEqual([
            {
                itemId: PYERITE,
                buyExecutionTotal: 0,
                sellExecutionTotal: 0,
                demandedQuantity: 0,
                unmetBuyQuantity: 0,
                unmetSellQuantity: 0,
            },
        ]);
        expect(outcome.valuation.hasInsufficientLiquidity).toBe(false);
    });

    it("completes an empty bundle with zero totals", async () => {
        const { provider, fetchOrderBook } = createFakeProvider(defaultBooks);
        const engine = new AppraisalEngine({ provider });

        const outcome = expectCompleted(await engine.valuate([], JITA));

        expect(fetchOrderBook).not.toHaveBeenCalled();
        expect(outcome.valuation).toEqual({
            totalBuyExecution: 0,
            totalSellExecution: 0,
            totalMidExecution: 0,
            hasInsufficientLiquidity: false,
        });
    });

    it("passes forceRefresh from the request", async () => {
        const { provider, fetchOrderBook } = createFakeProvider(defaultBooks);
        const engine = new AppraisalEngine({ provider });

        await engine.valuate([{ itemId: TRITANIUM, quantity: 1 }], JITA, undefined, { forceRefresh: true });

        expect(fetchOrderBook).toHaveBeenCalledWith(TRITANIUM, JITA.regionId, true, undefined);
    });

    describe("malformed input", () => {
        it("rejects an unknown hub", async () => {
            const { provider } = createFakeProvider(defaultBooks);
            const engine = new AppraisalEngine({ provider });

            await expect(engine.valuate([{ itemId: TRITANIUM, quantity: 1 }], "Dodixie")).rejects.toBeInstanceOf(
                HubResolutionError
            );
            await expect(
                engine.valuate([{ itemId: TRITANIUM, quantity: 1 }], { regionId: 0, systemId: 30000142 })
            ).rejects.toBeInstanceOf(HubResolutionError);
        });

        it("rejects a hub pair mixing one hub's region with another's system", async () => {
            const { provider, fetchOrderBook } = createFakeProvider(defaultBooks);
            const engine = new AppraisalEngine({ provider });

            await expect(
                engine.valuate([{ itemId: TRITANIUM, quantity: 10 }], {
                    regionId: AMARR.regionId,
                    systemId: JITA.systemId,
                })
            ).rejects.toThrow("Unknown trading hub: region_id:10000043/system_id:30000142");
            expect(fetchOrderBook).not.toHaveBeenCalled();
        });

        it("rejects a discount outside 1-99999", async () => {
            const { provider } = createFakeProvider(defaultBooks);
            const engine = new AppraisalEngine({ provider });

            await expect(engine.valuate([], JITA, 0)).rejects.toBeInstanceOf(InvalidDiscountError);
            await expect(engine.valuate([], JITA, 150000)).rejects.toBeInstanceOf(InvalidDiscountError);
        });

        it("rejects a negative quantity", async () => {
            const { provider, fetchOrderBook } = createFakeProvider(defaultBooks);
            const engine = new AppraisalEngine({ provider });

            await expect(engine.valuate([{ itemId: TRITANIUM, quantity: -1 }], JITA)).rejects.toBeInstanceOf(
                InvalidBundleError
            );
            expect(fetchOrderBook).not.toHaveBeenCalled();
        });
    });

    describe("cancellation", () => {
        it("returns cancelled without calling the provider when already aborted", async () => {
            const { provider, fetchOrderBook } = createFakeProvider(defaultBooks);
            const engine = new AppraisalEngine({ provider });
            const controller = new AbortController();
            controller.abort();

            const outcome = await engine.valuate([{ itemId: TRITANIUM, quantity: 1 }], JITA, undefined, {
                signal: controller.signal,
            });

            expect(outcome).toEqual({ status: "cancelled" });
            expect(fetchOrderBook).not.toHaveBeenCalled();
        });

        it("returns cancelled when aborted mid-fetch", async () => {
            const { provider } = createFakeProvider(defaultBooks, { delayMs: 50 });
            const engine = new AppraisalEngine({ provider });
            const controller = new AbortController();

            const pending = engine.valuate(
                [
                    { itemId: TRITANIUM, quantity: 10 },
                    { itemId: PYERITE, quantity: 5 },
                ],
                JITA,
                undefined,
                { signal: controller.signal }
            );
            setTimeout(() => controller.abort(), 5);

            expect(await pending).toEqual({ status: "cancelled" });
        });

        it("leaves the next request unaffected", async () => {
            const { provider } = createFakeProvider(defaultBooks, { delayMs: 20 });
            const engine = new AppraisalEngine({ provider });
            const controller = new AbortController();

            const cancelled = engine.valuate([{ itemId: TRITANIUM, quantity: 10 }], JITA, undefined, {
                signal: controller.signal,
            });
            controller.abort();
            expect(await cancelled).toEqual({ status: "cancelled" });

            const outcome = expectCompleted(
                await engine.valuate([{ itemId: PYERITE, quantity: 5 }], JITA)
            );

            expect(outcome.items.map((item) => item.itemId)).toEqual([PYERITE]);
            expect(outcome.valuation.totalBuyExecution).toBe(0);
            expect(outcome.valuation.hasInsufficientLiquidity).toBe(true);
        });
    });
});

describe("AppraisalEngine request IDs", () => {
    it("numbers requests per engine", async () => {
        const first = createChildLogger({ module: "engine-a" });
        const second = createChildLogger({ module: "engine-b" });
        const firstChild = vi.spyOn(first, "child");
        const secondChild = vi.spyOn(second, "child");
        const engineA = new AppraisalEngine({ provider: createFakeProvider(defaultBooks).provider, logger: first });
        const engineB = new AppraisalEngine({ provider: createFakeProvider(defaultBooks).provider, logger: second });

        await engineA.valuate([], JITA);
        await engineA.valuate([], JITA);
        await engineB.valuate([], JITA);

        expect(firstChild.mock.calls.map(([bindings]) => bindings.requestId)).toEqual([1, 2]);
        expect(secondChild.mock.calls.map(([bindings]) => bindings.requestId)).toEqual([1]);
    });
});

describe("AppraisalEngine.close", () => {
    it("closes the provider once and refuses further requests", async () => {
        const { provider, close } = createFakeProvider(defaultBooks);
        const engine = new AppraisalEngine({ provider });

        await engine.close();
        await engine.close();

        expect(close).toHaveBeenCalledTimes(1);
        await expect(engine.valuate([], JITA)).rejects.toThrow("AppraisalEngine is closed");
    });
});
