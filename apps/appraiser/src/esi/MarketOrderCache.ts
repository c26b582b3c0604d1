/**
 * In-memory market order cache with TTL.
 *
 * Keyed by (itemId, regionId). Owned by one engine session and cleared on
 * close, so nothing is shared across sessions.
 */

import type { OrderBookEntry } from "./types.js";

export interface MarketOrderCacheConfig {
    /** Entries older than this are treated as missing (ms). Default: 3 hours */
    ttlMs: number;

    /** Clock, overridable for tests. */
    now: () => number;
}

interface CacheEntry {
    orders: readonly OrderBookEntry[];
    storedAt: number;
}

export class MarketOrderCache {
    private entries: Map<string, CacheEntry> = new Map();
    private config: MarketOrderCacheConfig;

    constructor(config: Partial<MarketOrderCacheConfig> = {}) {
        this.config = {
            ttlMs: 3 * 60 * 60 * 1000,
            now: Date.now,
            ...config,
        };
    }

    private static key(itemId: number, regionId: number): string {
        return `${regionId}:${itemId}`;
    }

    /**
     * Get fresh orders, or null when missing or expired.
     * Expired entries are dropped on read.
     */
    get(itemId: number, regionId: number): readonly OrderBookEntry[] | null {
        const key = MarketOrderCache.key(itemId, regionId);
        const entry = this.entries.get(key);
        if (!entry) return null;

        if (this.config.now() - entry.storedAt >= this.config.ttlMs) {
            this.entries.delete(key);
            return null;
        }

        return entry.orders;
    }

    set(itemId: number, regionId: number, orders: readonly OrderBookEntry[]): void {
        this.entries.set(MarketOrderCache.key(itemId, regionId), {
            orders: Object.freeze([...orders]),
            storedAt: this.config.now(),
        });
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}
