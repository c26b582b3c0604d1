import { z } from "zod";
import { InvalidBundleError } from "./errors.js";
import type { BundleLine, DemandMap } from "./types.js";

const BundleLineSchema = z.object({
    itemId: z.number().int().positive(),
    quantity: z.number().int().nonnegative(),
});

const BundleSchema = z.array(BundleLineSchema);

/**
 * Merge duplicate items into one quantity per itemId.
 * Quantities are summed; zero quantities are kept and add nothing.
 *
 * @throws InvalidBundleError on a non-positive item ID or a negative/fractional quantity
 */
export function normalizeBundle(lines: readonly BundleLine[]): DemandMap {
    const parsed = BundleSchema.safeParse(lines);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid bundle";
        throw new InvalidBundleError(`Invalid bundle line ${where}`);
    }

    const demand: DemandMap = new Map();
    for (const { itemId, quantity } of parsed.data) {
        demand.set(itemId, (demand.get(itemId) ?? 0) + quantity);
    }
    return demand;
}
