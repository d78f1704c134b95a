/**
 * Path: src/exchanges/common/orderbook.ts
 * Helpers that turn raw [price, size] rows into a NormalizedOrderBook
 */

import { CollectorError, ErrorCode, ErrorSeverity } from "../../errors/types"
import { NormalizedOrderBook, OrderBookLevel } from "./types"

export function emptyOrderBook(): NormalizedOrderBook {
    return { price: null, bestBid: null, bestAsk: null, bids: [], asks: [] }
}

export function parseLevel(row: unknown, exchange: string): OrderBookLevel {
    if (!Array.isArray(row) || row.length < 2) {
        throw new CollectorError(
            ErrorCode.ADAPTER_PARSE_ERROR,
            `${exchange}: malformed order book row ${JSON.stringify(row)}`,
            undefined,
            ErrorSeverity.LOW
        )
    }
    const price = Number(row[0])
    const size = Number(row[1])
    if (!Number.isFinite(price) || !Number.isFinite(size)) {
        throw new CollectorError(
            ErrorCode.ADAPTER_PARSE_ERROR,
            `${exchange}: non-numeric order book row ${JSON.stringify(row)}`,
            undefined,
            ErrorSeverity.LOW
        )
    }
    return [price, size]
}

export function parseLevels(rows: unknown, exchange: string): OrderBookLevel[] {
    if (rows === undefined || rows === null) return []
    if (!Array.isArray(rows)) {
        throw new CollectorError(
            ErrorCode.ADAPTER_PARSE_ERROR,
            `${exchange}: order book side is not an array`,
            undefined,
            ErrorSeverity.LOW
        )
    }
    return rows.map((row) => parseLevel(row, exchange))
}

export function buildOrderBook(
    bids: OrderBookLevel[],
    asks: OrderBookLevel[]
): NormalizedOrderBook {
    const sortedBids = [...bids].sort((a, b) => b[0] - a[0])
    const sortedAsks = [...asks].sort((a, b) => a[0] - b[0])

    if (sortedBids.length === 0 || sortedAsks.length === 0) {
        return { ...emptyOrderBook(), bids: sortedBids, asks: sortedAsks }
    }

    const bestBid = sortedBids[0][0]
    const bestAsk = sortedAsks[0][0]
    return {
        price: (bestBid + bestAsk) / 2,
        bestBid,
        bestAsk,
        bids: sortedBids,
        asks: sortedAsks,
    }
}

export function isEmptyOrderBook(book: NormalizedOrderBook): boolean {
    return (
        book.bids.length === 0 ||
        book.asks.length === 0 ||
        book.price === null ||
        book.bestBid === null ||
        book.bestAsk === null
    )
}
