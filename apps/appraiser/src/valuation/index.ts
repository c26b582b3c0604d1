export { AppraisalEngine, createEsiAppraisalEngine } from "./engine.js";
export type { AppraisalEngineOptions, ValuateOptions, OwnedMarketDataProvider } from "./engine.js";
export { normalizeBundle } from "./bundle.js";
export { fetchOrderBooks, resolveConcurrency } from "./orderBookFetcher.js";
export type { FetchOrderBooksOptions } from "./orderBookFetcher.js";
export { consumeLiquidity, consumeLevels, sortedSide, quoteSide, averagePrice } from "./liquidity.js";
export type { OrderSide, SideConsumption, QuoteOptions, SideQuote } from "./liquidity.js";
export { aggregateValuations } from "./aggregator.js";
export {
    DiscountSetting,
    DiscountInputSchema,
    parseDiscountInput,
    applyDiscount,
    discountMultiplier,
    effectiveDiscountPercent,
} from "./discount.js";
export { InvalidBundleError, InvalidDiscountError, ValuationCancelledError } from "./errors.js";
export type {
    BundleLine,
    DemandMap,
    OrderBookMap,
    ItemValuation,
    PortfolioValuation,
    AggregatedValuation,
    ValuationPhase,
    ValuationOutcome,
    FetchProgress,
} from "./types.js";
