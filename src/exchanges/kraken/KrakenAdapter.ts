/**
 * Path: src/exchanges/kraken/KrakenAdapter.ts
 */
import { OrderBookAdapter, RawOrderBook } from "../OrderBookAdapter"
import { parseLevels } from "../common/orderbook"
import { KRAKEN_BASE_MAP, KrakenDepthResponse } from "./types"

export class KrakenAdapter extends OrderBookAdapter {
    readonly exchange = "kraken" as const

    protected defaultSymbolMap(): Record<string, string> {
        return KRAKEN_BASE_MAP
    }

    protected formatSymbol(base: string, quote: string): string {
        return `${base}${quote}` // XBTUSD
    }

    protected async fetchRawOrderBook(pair: string): Promise<RawOrderBook> {
        const response = await this.http.get<KrakenDepthResponse>(
            "/0/public/Depth",
            { params: { pair, count: 5000 } }
        )
        const { error, result } = response.data
        const book = result ? Object.values(result)[0] : undefined
        if (!book) {
            if (error && error.length > 0) {
                this.logger.debug("Kraken returned no book", { pair, error })
            }
            return { bids: [], asks: [] }
        }
        return {
            bids: parseLevels(book.bids, this.exchange),
            asks: parseLevels(book.asks, this.exchange),
        }
    }
}
