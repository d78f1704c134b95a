/**
 * Path: src/exchanges/binanceus/BinanceUsAdapter.ts
 */
import axios from "axios"
import { OrderBookAdapter, RawOrderBook } from "../OrderBookAdapter"
import { parseLevels } from "../common/orderbook"
import {
    BINANCE_US_DEPTH_LIMITS,
    BINANCE_US_INVALID_SYMBOL,
    BinanceUsDepthResponse,
    BinanceUsErrorResponse,
} from "./types"

export class BinanceUsAdapter extends OrderBookAdapter {
    readonly exchange = "binanceus" as const

    protected formatSymbol(base: string, quote: string): string {
        return `${base}${quote}` // BTCUSDT
    }

    protected async fetchRawOrderBook(symbol: string): Promise<RawOrderBook> {
        let lastError: unknown
        for (const limit of BINANCE_US_DEPTH_LIMITS) {
            try {
                const response = await this.http.get<BinanceUsDepthResponse>(
                    "/api/v3/depth",
                    { params: { symbol, limit } }
                )
                return {
                    bids: parseLevels(response.data.bids, this.exchange),
                    asks: parseLevels(response.data.asks, this.exchange),
                }
            } catch (error) {
                // unknown market: no smaller limit will help
                if (
                    axios.isAxiosError<BinanceUsErrorResponse>(error) &&
                    error.response?.status === 400 &&
                    error.response.data?.code === BINANCE_US_INVALID_SYMBOL
                ) {
                    return { bids: [], asks: [] }
                }
                lastError = error
                this.logger.debug("Depth request failed, trying smaller limit", {
                    symbol,
                    limit,
                })
            }
        }
        throw lastError
    }
}
