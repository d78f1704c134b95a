/**
 * Path: src/exchanges/binanceus/types.ts
 */

// GET /api/v3/depth
export interface BinanceUsDepthResponse {
    lastUpdateId: number
    bids: [string, string][] // [price, qty]
    asks: [string, string][]
}

// deepest first; the endpoint rejects limits some markets don't support
export const BINANCE_US_DEPTH_LIMITS = [5000, 1000, 500, 100] as const

// 400 body, e.g. {"code":-1121,"msg":"Invalid symbol."}
export interface BinanceUsErrorResponse {
    code: number
    msg: string
}

export const BINANCE_US_INVALID_SYMBOL = -1121
