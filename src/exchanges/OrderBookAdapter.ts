/**
 * Path: src/exchanges/OrderBookAdapter.ts
 * Base class for the per-exchange REST order book adapters
 */

import axios, { AxiosInstance } from "axios"
import { CollectorError, ErrorCode, ErrorSeverity } from "../errors/types"
import { Logger } from "../utils/logger"
import { buildOrderBook, isEmptyOrderBook } from "./common/orderbook"
import {
    AdapterOptions,
    ExchangeId,
    NormalizedOrderBook,
    OrderBookLevel,
} from "./common/types"

export interface IOrderBookAdapter {
    readonly exchange: ExchangeId
    fetchOrderBook(base: string, quote: string): Promise<NormalizedOrderBook>
}

export interface RawOrderBook {
    bids: OrderBookLevel[]
    asks: OrderBookLevel[]
}

export abstract class OrderBookAdapter implements IOrderBookAdapter {
    abstract readonly exchange: ExchangeId
    protected readonly http: AxiosInstance
    protected readonly logger: Logger

    constructor(protected readonly options: AdapterOptions) {
        this.http = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
        })
        this.logger = Logger.getInstance(this.constructor.name)
    }

    /** Exchange-specific base asset names (e.g. BTC -> XBT). */
    protected defaultSymbolMap(): Record<string, string> {
        return {}
    }

    /** Builds the exchange's market symbol from the mapped base and quote. */
    protected abstract formatSymbol(base: string, quote: string): string

    /** Fetches one book. An empty result means "no book for this market". */
    protected abstract fetchRawOrderBook(symbol: string): Promise<RawOrderBook>

    public mapBase(base: string): string {
        const upper = base.toUpperCase()
        return (
            this.options.symbolOverrides[upper] ??
            this.defaultSymbolMap()[upper] ??
            upper
        )
    }

    public async fetchOrderBook(
        base: string,
        quote: string
    ): Promise<NormalizedOrderBook> {
        const book = await this.fetchForQuote(base, quote)
        const fallback = this.options.fallbackQuote
        if (
            isEmptyOrderBook(book) &&
            fallback &&
            fallback.toUpperCase() !== quote.toUpperCase()
        ) {
            this.logger.debug("Primary quote has no book, using fallback", {
                base,
                quote,
                fallback,
            })
            return this.fetchForQuote(base, fallback)
        }
        return book
    }

    private async fetchForQuote(
        base: string,
        quote: string
    ): Promise<NormalizedOrderBook> {
        const symbol = this.formatSymbol(this.mapBase(base), quote.toUpperCase())
        try {
            const raw = await this.fetchRawOrderBook(symbol)
            return buildOrderBook(raw.bids, raw.asks)
        } catch (error) {
            throw this.toCollectorError(symbol, error)
        }
    }

    protected toCollectorError(symbol: string, error: unknown): CollectorError {
        if (error instanceof CollectorError) {
            return error
        }
        if (axios.isAxiosError(error)) {
            if (error.response?.status === 429) {
                return new CollectorError(
                    ErrorCode.API_RATE_LIMIT,
                    `${this.exchange} API rate limit exceeded (${symbol})`,
                    error,
                    ErrorSeverity.HIGH
                )
            }
            return new CollectorError(
                ErrorCode.ADAPTER_REQUEST_FAILED,
                `${this.exchange} request failed (${symbol}): ${error.message}`,
                error,
                ErrorSeverity.MEDIUM
            )
        }
        return new CollectorError(
            ErrorCode.ADAPTER_PARSE_ERROR,
            `${this.exchange} response could not be parsed (${symbol})`,
            error instanceof Error ? error : undefined,
            ErrorSeverity.MEDIUM
        )
    }
}
