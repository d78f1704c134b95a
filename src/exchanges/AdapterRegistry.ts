/**
 * Path: src/exchanges/AdapterRegistry.ts
 *
 * Exchange id -> adapter implementation, resolved once at startup
 */

import { ExchangeConfig } from "../config/types"
import { CollectorError, ErrorCode, ErrorSeverity } from "../errors/types"
import { BinanceUsAdapter } from "./binanceus/BinanceUsAdapter"
import { BybitAdapter } from "./bybit/BybitAdapter"
import { CoinbaseAdapter } from "./coinbase/CoinbaseAdapter"
import { AdapterOptions, ExchangeId, isExchangeId } from "./common/types"
import { CryptoComAdapter } from "./cryptocom/CryptoComAdapter"
import { KrakenAdapter } from "./kraken/KrakenAdapter"
import { IOrderBookAdapter } from "./OrderBookAdapter"

type AdapterFactory = (options: AdapterOptions) => IOrderBookAdapter

const ADAPTERS: Record<ExchangeId, AdapterFactory> = {
    binanceus: (options) => new BinanceUsAdapter(options),
    coinbase: (options) => new CoinbaseAdapter(options),
    kraken: (options) => new KrakenAdapter(options),
    bybit: (options) => new BybitAdapter(options),
    cryptocom: (options) => new CryptoComAdapter(options),
}

export function createAdapter(
    config: ExchangeConfig,
    timeoutMs: number
): IOrderBookAdapter {
    if (!isExchangeId(config.exchange)) {
        throw new CollectorError(
            ErrorCode.UNSUPPORTED_EXCHANGE,
            `Unsupported exchange: ${config.exchange}`,
            undefined,
            ErrorSeverity.CRITICAL
        )
    }
    return ADAPTERS[config.exchange]({
        baseUrl: config.baseUrl,
        timeoutMs,
        symbolOverrides: config.symbols,
        fallbackQuote: config.fallbackQuote,
    })
}

export function createAdapters(
    configs: ExchangeConfig[],
    timeoutMs: number
): Map<ExchangeId, IOrderBookAdapter> {
    const adapters = new Map<ExchangeId, IOrderBookAdapter>()
    for (const config of configs) {
        adapters.set(config.exchange, createAdapter(config, timeoutMs))
    }
    return adapters
}
