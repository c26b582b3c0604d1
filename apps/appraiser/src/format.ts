/**
 * Format an ISK amount for logs: 1.234B, 56.78M, 9.10K, or plain with two decimals.
 */
export function formatIsk(amount: number): string {
    const abs = Math.abs(amount);
    if (abs >= 1_000_000_000) return `${(amount / 1_000_000_000).toFixed(3)}B`;
    if (abs >= 1_000_000) return `${(amount / 1_000_000).toFixed(2)}M`;
    if (abs >= 1_000) return `${(amount / 1_000).toFixed(2)}K`;
    return amount.toFixed(2);
}
