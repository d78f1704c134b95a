/**
 * Path: src/exchanges/cryptocom/CryptoComAdapter.ts
 */
import { OrderBookAdapter, RawOrderBook } from "../OrderBookAdapter"
import { parseLevels } from "../common/orderbook"
import { CRYPTO_COM_DEPTH, CryptoComBookResponse } from "./types"

export class CryptoComAdapter extends OrderBookAdapter {
    readonly exchange = "cryptocom" as const

    protected formatSymbol(base: string, quote: string): string {
        return `${base}_${quote}` // BTC_USDT
    }

    protected async fetchRawOrderBook(instrument: string): Promise<RawOrderBook> {
        const response = await this.http.get<CryptoComBookResponse>(
            "/v2/public/get-book",
            { params: { instrument_name: instrument, depth: CRYPTO_COM_DEPTH } }
        )
        const book = response.data.result?.data?.[0]
        if (!book) {
            return { bids: [], asks: [] }
        }
        return {
            bids: parseLevels(book.bids, this.exchange),
            asks: parseLevels(book.asks, this.exchange),
        }
    }
}
