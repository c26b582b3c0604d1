import type Bottleneck from "bottleneck";
import { request, type Dispatcher } from "undici";
import { z } from "zod";
import { env } from "../config/env.js";
import { createEsiLimiter } from "../http/limiters.js";
import { createChildLogger, type Logger } from "../log/logger.js";
import { MarketOrderCache } from "./MarketOrderCache.js";
import {
    EsiMarketOrdersPageSchema,
    toOrderBookEntry,
    type MarketDataProvider,
    type OrderBookEntry,
} from "./types.js";

/**
 * Non-200 response from ESI.
 */
export class EsiRequestError extends Error {
    constructor(
        readonly statusCode: number,
        readonly body: string,
        readonly url: string
    ) {
        super(`ESI error ${statusCode}: ${body}`);
        this.name = "EsiRequestError";
    }
}

export interface EsiMarketClientOptions {
    baseUrl?: string;
    userAgent?: string;
    timeoutMs?: number;
    cache?: MarketOrderCache;
    limiter?: Bottleneck;
    /** undici dispatcher; tests pass a MockAgent. */
    dispatcher?: Dispatcher;
    logger?: Logger;
}

interface EsiPage<T> {
    data: T;
    pages: number;
}

function parsePagesHeader(value: string | string[] | undefined): number {
    const raw = Array.isArray(value) ? value[0] : value;
    const pages = raw === undefined ? 1 : Number.parseInt(raw, 10);
    return Number.isFinite(pages) && pages > 1 ? pages : 1;
}

/**
 * ESI market order client.
 *
 * Fetches every page of a region's orders for one type, caches the result per
 * (type, region), and paces requests through a shared limiter.
 */
export class EsiMarketClient implements MarketDataProvider {
    private readonly baseUrl: string;
    private readonly userAgent: string;
    private readonly timeoutMs: number;
    private readonly cache: MarketOrderCache;
    private readonly limiter: Bottleneck;
    private readonly ownsLimiter: boolean;
    private readonly dispatcher: Dispatcher | undefined;
    private readonly log: Logger;

    constructor(options: EsiMarketClientOptions = {}) {
        this.baseUrl = options.baseUrl ?? env.ESI_BASE_URL;
        this.userAgent = options.userAgent ?? env.ESI_USER_AGENT;
        this.timeoutMs = options.timeoutMs ?? env.ESI_TIMEOUT_MS;
        this.cache = options.cache ?? new MarketOrderCache({ ttlMs: env.MARKET_CACHE_TTL_MS });
        this.ownsLimiter = options.limiter === undefined;
        this.limiter = options.limiter ?? createEsiLimiter();
        this.dispatcher = options.dispatcher;
        this.log = options.logger ?? createChildLogger({ module: "esi-market" });
    }

    /**
     * Rate-limited GET against ESI, validated with `schema`.
     * The request is aborted by the caller's signal or by the per-request timeout.
     */
    private async esiRequest<T>(
        path: string,
        schema: z.ZodType<T>,
        params: Record<string, string>,
        signal?: AbortSignal
    ): Promise<EsiPage<T>> {
        const url = new URL(path, this.baseUrl);
        for (const [key, value] of Object.entries(params)) {
            url.searchParams.set(key, value);
        }

        return this.limiter.schedule(async () => {
            signal?.throwIfAborted();

            const timeout = AbortSignal.timeout(this.timeoutMs);
            const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

            this.log.debug({ url: url.toString() }, "ESI request");
            const response = await request(url.toString(), {
                method: "GET",
                headers: {
                    Accept: "application/json",
                    "User-Agent": this.userAgent,
                },
                signal: combined,
                dispatcher: this.dispatcher,
            });

            if (response.statusCode !== 200) {
                const body = await response.body.text();
                throw new EsiRequestError(response.statusCode, body, url.toString());
            }

            const json = await response.body.json();
            return {
                data: schema.parse(json),
                pages: parsePagesHeader(response.headers["x-pages"]),
            };
        });
    }

    private async fetchAllPages(
        itemId: number,
        regionId: number,
        signal?: AbortSignal
    ): Promise<OrderBookEntry[]> {
        const path = `markets/${regionId}/orders/`;
        const params = (page: number) => ({
            type_id: String(itemId),
            order_type: "all",
            datasource: "tranquility",
            page: String(page),
        });

        const first = await this.esiRequest(path, EsiMarketOrdersPageSchema, params(1), signal);
        const orders = first.data.map(toOrderBookEntry);

        for (let page = 2; page <= first.pages; page++) {
            const next = await this.esiRequest(path, EsiMarketOrdersPageSchema, params(page), signal);
            orders.push(...next.data.map(toOrderBookEntry));
        }

        return orders;
    }

    async fetchOrderBook(
        itemId: number,
        regionId: number,
        forceRefresh: boolean,
        signal?: AbortSignal
    ): Promise<readonly OrderBookEntry[]> {
        const log = this.log.child({ itemId, regionId });

        if (!forceRefresh) {
            const cached = this.cache.get(itemId, regionId);
            if (cached) {
                log.debug({ orders: cached.length }, "Using cached market orders");
                return cached;
            }
        }

        const orders = await this.fetchAllPages(itemId, regionId, signal);
        this.cache.set(itemId, regionId, orders);

        log.debug({ orders: orders.length, forceRefresh }, "Fetched market orders");
        return orders;
    }

    /**
     * Drop cached orders and release the limiter if this client created it.
     */
    async close(): Promise<void> {
        this.cache.clear();
        if (this.ownsLimiter) {
            await this.limiter.disconnect();
        }
    }
}
