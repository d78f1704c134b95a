/**
 * Path: src/exchanges/kraken/types.ts
 */

// [price, volume, timestamp]
export type KrakenLevel = [string, string, number]

// GET /0/public/Depth, result is keyed by Kraken's own pair name (XXBTZUSD)
export interface KrakenDepthResponse {
    error: string[]
    result?: Record<string, { bids: KrakenLevel[]; asks: KrakenLevel[] }>
}

export const KRAKEN_BASE_MAP: Record<string, string> = {
    BTC: "XBT",
}
