export { EsiMarketClient, EsiRequestError } from "./client.js";
export type { EsiMarketClientOptions } from "./client.js";
export { MarketOrderCache } from "./MarketOrderCache.js";
export type { MarketOrderCacheConfig } from "./MarketOrderCache.js";
export { EsiMarketOrderSchema, toOrderBookEntry } from "./types.js";
export type { EsiMarketOrder, OrderBookEntry, MarketDataProvider } from "./types.js";
