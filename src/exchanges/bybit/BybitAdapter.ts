/**
 * Path: src/exchanges/bybit/BybitAdapter.ts
 */
import { OrderBookAdapter, RawOrderBook } from "../OrderBookAdapter"
import { parseLevels } from "../common/orderbook"
import { BYBIT_SPOT_DEPTH_LIMIT, BybitOrderBookResponse } from "./types"

export class BybitAdapter extends OrderBookAdapter {
    readonly exchange = "bybit" as const

    protected formatSymbol(base: string, quote: string): string {
        return `${base}${quote}` // BTCUSDT
    }

    protected async fetchRawOrderBook(symbol: string): Promise<RawOrderBook> {
        const response = await this.http.get<BybitOrderBookResponse>(
            "/v5/market/orderbook",
            {
                params: {
                    category: "spot",
                    symbol,
                    limit: BYBIT_SPOT_DEPTH_LIMIT,
                },
            }
        )
        const { retCode, retMsg, result } = response.data
        if (retCode !== 0 || !result || !("b" in result)) {
            this.logger.debug("Bybit returned no book", { symbol, retCode, retMsg })
            return { bids: [], asks: [] }
        }
        return {
            bids: parseLevels(result.b, this.exchange),
            asks: parseLevels(result.a, this.exchange),
        }
    }
}
