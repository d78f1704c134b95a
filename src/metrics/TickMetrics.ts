/**
 * Path: src/metrics/TickMetrics.ts
 * Spread and depth metrics derived from one normalized order book
 */

import { NormalizedOrderBook, OrderBookLevel } from "../exchanges/common/types"

export const DEEP_SPREAD_DEPTH = 5000
export const VOLUME_DEPTH = 50

export interface TickMetrics {
    price: number | null
    bestBid: number | null
    bestAsk: number | null
    spreadRaw: number | null
    spreadPct5: number | null
    spreadPct20: number | null
    spreadPct50: number | null
    spreadPct100: number | null
    spreadPct5000?: number | null // only for exchanges with deep books
    bidVolume50: number
    askVolume50: number
}

/**
 * Mean of ask[i] - bid[i] over the first min(depth, |bids|, |asks|) rungs.
 * Rungs are paired by index, not by price, so this approximates the spread
 * paid at that depth rather than walking the book.
 */
export function layeredAvgSpread(
    bids: readonly OrderBookLevel[],
    asks: readonly OrderBookLevel[],
    depth: number
): number | null {
    const d = Math.min(depth, bids.length, asks.length)
    if (d <= 0) return null
    let total = 0
    for (let i = 0; i < d; i++) {
        total += asks[i][0] - bids[i][0]
    }
    return total / d
}

export function pctOfMid(
    value: number | null | undefined,
    mid: number | null | undefined
): number | null {
    if (value === null || value === undefined) return null
    if (mid === null || mid === undefined || mid <= 0) return null
    return (value / mid) * 100
}

export function sumDepthSizes(
    rows: readonly OrderBookLevel[],
    depth: number
): number {
    const d = Math.min(depth, rows.length)
    let total = 0
    for (let i = 0; i < d; i++) {
        total += rows[i][1]
    }
    return total
}

export function computeTickMetrics(
    book: NormalizedOrderBook,
    options: { deepBook: boolean } = { deepBook: false }
): TickMetrics {
    const { price, bestBid, bestAsk, bids, asks } = book
    const spreadPct = (depth: number) =>
        pctOfMid(layeredAvgSpread(bids, asks, depth), price)

    const metrics: TickMetrics = {
        price,
        bestBid,
        bestAsk,
        spreadRaw: bestAsk !== null && bestBid !== null ? bestAsk - bestBid : null,
        spreadPct5: spreadPct(5),
        spreadPct20: spreadPct(20),
        spreadPct50: spreadPct(50),
        spreadPct100: spreadPct(100),
        bidVolume50: sumDepthSizes(bids, VOLUME_DEPTH),
        askVolume50: sumDepthSizes(asks, VOLUME_DEPTH),
    }
    if (options.deepBook) {
        metrics.spreadPct5000 = spreadPct(DEEP_SPREAD_DEPTH)
    }
    return metrics
}
