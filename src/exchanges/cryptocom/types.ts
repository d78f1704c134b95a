/**
 * Path: src/exchanges/cryptocom/types.ts
 */

// [price, quantity, number of orders]
export type CryptoComLevel = [string, string, string]

// GET /v2/public/get-book
export interface CryptoComBookResponse {
    code: number
    result?: {
        instrument_name: string
        depth: number
        data: { bids: CryptoComLevel[]; asks: CryptoComLevel[]; t: number }[]
    }
}

export const CRYPTO_COM_DEPTH = 2000
