import { parseArgs } from "util";
import { DEFAULT_HUB, formatMarketLocation } from "@hub-appraiser/shared";
import { parseDiscountInput } from "./valuation/discount.js";
import type { BundleLine } from "./valuation/types.js";

export interface CliOptions {
    lines: BundleLine[];
    hub: string;
    discountPercent: number | undefined;
    forceRefresh: boolean;
}

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CliUsageError";
    }
}

export const USAGE = "usage: appraise <typeId:quantity>... [--hub Jita] [--discount 90] [--refresh]";

const LINE_PATTERN = /^(\d+):(\d+)$/;

function parseLine(arg: string): BundleLine {
    const match = LINE_PATTERN.exec(arg);
    if (!match) {
        throw new CliUsageError(`Expected typeId:quantity, got "${arg}"`);
    }
    return { itemId: Number(match[1]), quantity: Number(match[2]) };
}

function readArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                hub: { type: "string" },
                discount: { type: "string" },
                refresh: { type: "boolean", default: false },
            },
        });
    } catch (err) {
        // parseArgs throws a TypeError for unknown flags and missing values
        throw new CliUsageError(err instanceof Error ? err.message : String(err));
    }
}

/**
 * Parse `appraise` arguments. A bad discount is a usage error here; there is
 * no previous value to fall back to on the command line.
 */
export function parseCliArgs(argv: string[]): CliOptions {
    const { values, positionals } = readArgs(argv);

    if (positionals.length === 0) {
        throw new CliUsageError("No items given");
    }

    let discountPercent: number | undefined;
    if (values.discount !== undefined) {
        const parsed = parseDiscountInput(values.discount);
        if (parsed === null) {
            throw new CliUsageError(`Invalid discount "${values.discount}" (1-99999)`);
        }
        discountPercent = parsed;
    }

    return {
        lines: positionals.map(parseLine),
        hub: values.hub ?? formatMarketLocation(DEFAULT_HUB),
        discountPercent,
        forceRefresh: values.refresh ?? false,
    };
}
