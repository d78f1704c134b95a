/**
 * Path: src/exchanges/bybit/types.ts
 */

// GET /v5/market/orderbook?category=spot
export interface BybitOrderBookResponse {
    retCode: number
    retMsg: string
    result: {
        s: string // symbol
        b: [string, string][] // bids [price, size]
        a: [string, string][] // asks [price, size]
        ts: number
        u: number // update id
    } | Record<string, never>
}

export const BYBIT_SPOT_DEPTH_LIMIT = 200
