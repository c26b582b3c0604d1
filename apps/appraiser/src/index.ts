import { logger } from "./log/logger.js";
import { CliUsageError, USAGE, parseCliArgs, type CliOptions } from "./cli.js";
import { formatIsk } from "./format.js";
import { createEsiAppraisalEngine } from "./valuation/index.js";

async function main(): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(process.argv.slice(2));
    } catch (err) {
        if (err instanceof CliUsageError) {
            logger.error(err.message);
            logger.info(USAGE);
            return 2;
        }
        throw err;
    }

    const engine = createEsiAppraisalEngine();
    const controller = new AbortController();

    const cancel = () => {
        logger.info("Cancelling valuation...");
        controller.abort();
    };
    process.on("SIGTERM", cancel);
    process.on("SIGINT", cancel);

    try {
        const outcome = await engine.valuate(options.lines, options.hub, options.discountPercent, {
            signal: controller.signal,
            forceRefresh: options.forceRefresh,
            onProgress: ({ completed, total }) => {
                logger.debug({ completed, total }, "Order books loaded");
            },
        });

        if (outcome.status === "cancelled") {
            logger.warn("Valuation cancelled");
            return 130;
        }

        const { valuation, rawValuation, hub, discountPercent } = outcome;
        logger.info(
            {
                hub: hub.name ?? `${hub.regionId}/${hub.systemId}`,
                discountPercent,
                buy: formatIsk(valuation.totalBuyExecution),
                mid: formatIsk(valuation.totalMidExecution),
                sell: formatIsk(valuation.totalSellExecution),
                hasInsufficientLiquidity: valuation.hasInsufficientLiquidity,
                buyShortfallItemIds: rawValuation.buyShortfallItemIds,
                sellShortfallItemIds: rawValuation.sellShortfallItemIds,
            },
            "Appraisal"
        );
        return 0;
    } finally {
        process.off("SIGTERM", cancel);
        process.off("SIGINT", cancel);
        await engine.close();
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err) => {
        logger.fatal({ err }, "Appraisal failed");
        process.exitCode = 1;
    });
