/**
 * Path: src/exchanges/common/types.ts
 */

export const EXCHANGE_IDS = [
    "binanceus",
    "coinbase",
    "kraken",
    "bybit",
    "cryptocom",
] as const

export type ExchangeId = (typeof EXCHANGE_IDS)[number]

export function isExchangeId(value: string): value is ExchangeId {
    return (EXCHANGE_IDS as readonly string[]).includes(value)
}

// [price, size]
export type OrderBookLevel = [number, number]

/**
 * Order book as every adapter returns it.
 * bids are sorted by price descending, asks ascending. When either side is
 * empty, price/bestBid/bestAsk are all null.
 */
export interface NormalizedOrderBook {
    price: number | null // mid
    bestBid: number | null
    bestAsk: number | null
    bids: OrderBookLevel[]
    asks: OrderBookLevel[]
}

export interface AdapterOptions {
    baseUrl: string
    timeoutMs: number
    symbolOverrides: Record<string, string>
    fallbackQuote?: string
}
