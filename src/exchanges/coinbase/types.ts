/**
 * Path: src/exchanges/coinbase/types.ts
 */

// GET /products/{product}/book?level=2, rows are [price, size, num-orders]
export interface CoinbaseBookResponse {
    sequence: number
    bids: [string, string, number][]
    asks: [string, string, number][]
}
