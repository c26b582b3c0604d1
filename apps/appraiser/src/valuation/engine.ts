/**
 * Portfolio valuation engine.
 *
 * One request runs: normalize bundle → fetch order books (bounded pool) →
 * consume liquidity per item → aggregate → apply discount.
 *
 * Phases: idle → fetching → computing → done | cancelled. A cancelled request
 * never produces a valuation. Per-item fetch problems end up in the result's
 * shortfall fields, not as errors.
 */

import {
    parseValuationSettings,
    resolveHub,
    resolveHubPair,
    MAX_DISCOUNT_PERCENT,
    type TradeHub,
    type ValuationSettings,
    type ValuationSettingsInput,
} from "@hub-appraiser/shared";
import { env } from "../config/env.js";
import { EsiMarketClient, type MarketDataProvider } from "../esi/index.js";
import { createChildLogger, type Logger } from "../log/logger.js";
import { aggregateValuations } from "./aggregator.js";
import { normalizeBundle } from "./bundle.js";
import { applyDiscount, effectiveDiscountPercent } from "./discount.js";
import { InvalidDiscountError, ValuationCancelledError } from "./errors.js";
import { consumeLiquidity } from "./liquidity.js";
import { fetchOrderBooks } from "./orderBookFetcher.js";
import type {
    BundleLine,
    FetchProgress,
    ItemValuation,
    OrderBookMap,
    ValuationOutcome,
    ValuationPhase,
} from "./types.js";

/**
 * A provider the engine owns may release resources on close.
 */
export type OwnedMarketDataProvider = MarketDataProvider & {
    close?: () => Promise<void>;
};

export interface AppraisalEngineOptions {
    provider: OwnedMarketDataProvider;
    settings?: ValuationSettingsInput;
    logger?: Logger;
}

export interface ValuateOptions {
    signal?: AbortSignal;
    /** Overrides settings.forceRefresh for this request. */
    forceRefresh?: boolean;
    onProgress?: (progress: FetchProgress) => void;
}

export class AppraisalEngine {
    readonly settings: ValuationSettings;
    private readonly provider: OwnedMarketDataProvider;
    private readonly log: Logger;
    private closed = false;
    private requestCounter = 0;

    constructor(options: AppraisalEngineOptions) {
        this.provider = options.provider;
        this.settings = parseValuationSettings(options.settings);
        this.log = options.logger ?? createChildLogger({ module: "appraisal-engine" });
    }

    private resolveHubInput(hub: TradeHub | string): TradeHub {
        return typeof hub === "string" ? resolveHub(hub) : resolveHubPair(hub);
    }

    private resolveDiscount(discountPercent: number | undefined): number {
        const percent = discountPercent ?? this.settings.defaultDiscountPercent;
        if (!Number.isInteger(percent) || percent < 1 || percent > MAX_DISCOUNT_PERCENT) {
            throw new InvalidDiscountError(percent);
        }
        return effectiveDiscountPercent(percent, this.settings.discountCapPercent);
    }

    /**
     * Value a bundle at a hub.
     *
     * @param hub - A hub, a hub name ("Jita") or a system location ("system_id:30000142")
     * @param discountPercent - Whole percent 1-99999; defaults to settings
     * @throws InvalidBundleError, HubResolutionError, InvalidDiscountError on malformed input
     */
    async valuate(
        lines: readonly BundleLine[],
        hub: TradeHub | string,
        discountPercent?: number,
        options: ValuateOptions = {}
    ): Promise<ValuationOutcome> {
        if (this.closed) {
            throw new Error("AppraisalEngine is closed");
        }

        const resolvedHub = this.resolveHubInput(hub);
        const percent = this.resolveDiscount(discountPercent);
        const demand = normalizeBundle(lines);
        const { signal } = options;

        const log = this.log.child({
            requestId: ++this.requestCounter,
            regionId: resolvedHub.regionId,
            systemId: resolvedHub.systemId,
        });
        let phase: ValuationPhase = "idle";
        const enter = (next: ValuationPhase) => {
            log.debug({ from: phase, to: next }, "Valuation phase");
            phase = next;
        };

        if (signal?.aborted) {
            enter("cancelled");
            return { status: "cancelled" };
        }

        // Zero-quantity items contribute nothing; no need to fetch them
        const toFetch = [...demand].filter(([, quantity]) => quantity > 0).map(([itemId]) => itemId);

        enter("fetching");
        let books: OrderBookMap;
        try {
            books = await fetchOrderBooks(toFetch, {
                provider: this.provider,
                regionId: resolvedHub.regionId,
                forceRefresh: options.forceRefresh ?? this.settings.forceRefresh,
                maxConcurrency: this.settings.maxConcurrency,
                signal,
                onProgress: options.onProgress,
                logger: log,
            });
        } catch (err) {
            if (err instanceof ValuationCancelledError) {
                enter("cancelled");
                return { status: "cancelled" };
            }
            throw err;
        }

        if (signal?.aborted) {
            enter("cancelled");
            return { status: "cancelled" };
        }

        enter("computing");
        const items: ItemValuation[] = [];
        for (const [itemId, quantity] of demand) {
            items.push(consumeLiquidity(itemId, books.get(itemId) ?? [], quantity, resolvedHub.systemId));
        }

        const rawValuation = aggregateValuations(items);
        const valuation = applyDiscount(rawValuation, percent, this.settings.discountCapPercent);
        enter("done");

        log.info(
            {
                itemCount: items.length,
                totalBuyExecution: rawValuation.totalBuyExecution,
                totalSellExecution: rawValuation.totalSellExecution,
                hasInsufficientLiquidity: rawValuation.hasInsufficientLiquidity,
                discountPercent: percent,
            },
            "Valuation complete"
        );

        return {
            status: "completed",
            valuation,
            rawValuation,
            items,
            hub: resolvedHub,
            discountPercent: percent,
        };
    }

    /**
     * Release the provider. Further valuate() calls throw.
     */
    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.provider.close?.();
        this.log.debug("Appraisal engine closed");
    }
}

/**
 * Engine backed by ESI, configured from the environment.
 * Each engine owns its own client, cache and limiter.
 */
export function createEsiAppraisalEngine(settings: ValuationSettingsInput = {}): AppraisalEngine {
    return new AppraisalEngine({
        provider: new EsiMarketClient(),
        settings: {
            maxConcurrency: env.VALUATION_MAX_CONCURRENCY,
            discountCapPercent: env.DISCOUNT_CAP_PERCENT,
            ...settings,
        },
    });
}
