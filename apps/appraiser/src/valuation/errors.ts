/**
 * Malformed bundle (bad item ID or quantity). Fatal to the request.
 */
export class InvalidBundleError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "InvalidBundleError";
    }
}

/**
 * Discount outside 1..99999 passed directly to the engine.
 * User-typed input goes through parseDiscountInput instead and never throws.
 */
export class InvalidDiscountError extends Error {
    constructor(readonly percent: number) {
        super(`Invalid discount percent: ${percent}`);
        this.name = "InvalidDiscountError";
    }
}

/**
 * Raised inside the engine when the request's signal aborts.
 * The engine turns it into a `{ status: "cancelled" }` outcome.
 */
export class ValuationCancelledError extends Error {
    constructor() {
        super("Valuation cancelled");
        this.name = "ValuationCancelledError";
    }
}
