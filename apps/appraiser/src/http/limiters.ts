import Bottleneck from "bottleneck";
import { env } from "../config/env.js";
import { logger } from "../log/logger.js";

/**
 * ESI rate limiter.
 *
 * Each EsiMarketClient owns one limiter, so every valuation run through that
 * client shares its pacing. Separate clients are paced separately.
 * The per-valuation worker pool bounds in-flight requests; this bounds rate.
 */
export function createEsiLimiter(maxRps: number = env.ESI_MAX_RPS): Bottleneck {
    const limiter = new Bottleneck({
        minTime: Math.ceil(1000 / maxRps),
        reservoir: maxRps * 2, // Burst capacity
        reservoirRefreshAmount: maxRps,
        reservoirRefreshInterval: 1000,
    });

    // "failed" fires on job errors, not throttling. Aborts come from cancellation.
    limiter.on("failed", (error, jobInfo) => {
        if (error instanceof Error && error.name === "AbortError") {
            logger.debug({ jobId: jobInfo.options.id }, "ESI request aborted");
            return;
        }
        const errorMessage = error instanceof Error ? error.message : String(error);
        logger.warn(
            { error: errorMessage, jobId: jobInfo.options.id },
            "ESI request failed"
        );
    });

    return limiter;
}
