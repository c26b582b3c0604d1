/**
 * Trading hubs.
 *
 * A hub is a (region, system) pair. Orders are fetched per region and then
 * filtered down to the hub's system.
 */

export interface TradeHub {
    name?: string;
    regionId: number;
    systemId: number;
}

export const TRADE_HUBS = {
    Jita: { name: "Jita", regionId: 10_000_002, systemId: 30_000_142 },
    Amarr: { name: "Amarr", regionId: 10_000_043, systemId: 30_002_187 },
    Rens: { name: "Rens", regionId: 10_000_030, systemId: 30_002_510 },
    Hek: { name: "Hek", regionId: 10_000_042, systemId: 30_002_053 },
} as const satisfies Record<string, TradeHub>;

export type TradeHubName = keyof typeof TRADE_HUBS;

export const DEFAULT_HUB: TradeHub = TRADE_HUBS.Jita;

/**
 * Market location as stored by the app: "system_id:30000142" or "region_id:10000002".
 */
export type MarketLocation =
    | { kind: "system"; id: number }
    | { kind: "region"; id: number };

export class HubResolutionError extends Error {
    constructor(readonly input: string) {
        super(`Unknown trading hub: ${input}`);
        this.name = "HubResolutionError";
    }
}

const LOCATION_PATTERN = /^(system_id|region_id):(\d+)$/;

/**
 * Parse a market location string. Returns null when it is not one.
 */
export function parseMarketLocation(location: string): MarketLocation | null {
    const match = LOCATION_PATTERN.exec(location.trim());
    if (!match) return null;

    const id = Number(match[2]);
    if (!Number.isSafeInteger(id) || id <= 0) return null;

    return { kind: match[1] === "system_id" ? "system" : "region", id };
}

export function formatMarketLocation(hub: TradeHub): string {
    return `system_id:${hub.systemId}`;
}

function findHubBySystem(systemId: number): TradeHub | undefined {
    return Object.values(TRADE_HUBS).find((hub) => hub.systemId === systemId);
}

function findHubByName(name: string): TradeHub | undefined {
    const wanted = name.trim().toLowerCase();
    return Object.values(TRADE_HUBS).find((hub) => hub.name.toLowerCase() === wanted);
}

/**
 * Resolve a hub name ("jita") or a system location ("system_id:30000142").
 *
 * Region locations are rejected: valuation filters orders by system, and a
 * region alone does not name one.
 */
export function resolveHub(input: string): TradeHub {
    const byName = findHubByName(input);
    if (byName) return byName;

    const location = parseMarketLocation(input);
    if (location?.kind === "system") {
        const bySystem = findHubBySystem(location.id);
        if (bySystem) return bySystem;
    }

    throw new HubResolutionError(input);
}

/**
 * Resolve an explicit (region, system) pair to the known hub it names.
 * The system must be a hub and the region must be that hub's region.
 */
export function resolveHubPair(hub: TradeHub): TradeHub {
    const known = findHubBySystem(hub.systemId);
    if (!known || known.regionId !== hub.regionId) {
        throw new HubResolutionError(`region_id:${hub.regionId}/system_id:${hub.systemId}`);
    }
    return known;
}
