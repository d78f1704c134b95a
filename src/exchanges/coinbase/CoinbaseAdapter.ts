/**
 * Path: src/exchanges/coinbase/CoinbaseAdapter.ts
 */
import axios from "axios"
import { OrderBookAdapter, RawOrderBook } from "../OrderBookAdapter"
import { parseLevels } from "../common/orderbook"
import { CoinbaseBookResponse } from "./types"

export class CoinbaseAdapter extends OrderBookAdapter {
    readonly exchange = "coinbase" as const

    protected formatSymbol(base: string, quote: string): string {
        return `${base}-${quote}` // BTC-USD
    }

    protected async fetchRawOrderBook(product: string): Promise<RawOrderBook> {
        try {
            const response = await this.http.get<CoinbaseBookResponse>(
                `/products/${encodeURIComponent(product)}/book`,
                { params: { level: 2 } }
            )
            return {
                bids: parseLevels(response.data.bids, this.exchange),
                asks: parseLevels(response.data.asks, this.exchange),
            }
        } catch (error) {
            // unknown product
            if (axios.isAxiosError(error) && error.response?.status === 404) {
                return { bids: [], asks: [] }
            }
            throw error
        }
    }
}
