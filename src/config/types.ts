/**
 * Path: src/config/types.ts
 * Configuration types
 */

import { ExchangeId } from "../exchanges/common/types"

export interface AppConfig {
    bucket: string
    assets: string[]
    rowIntervalMs: number
    uploadIntervalMs: number
    requestTimeoutMs: number
    dataDir: string
    makePublic: boolean
    exchanges: ExchangeConfig[] // enabled only
    api: ApiConfig
}

export interface ExchangeConfig {
    exchange: ExchangeId
    quote: string
    fallbackQuote?: string
    symbols: Record<string, string> // base asset overrides, e.g. BTC -> XBT
    deepBook: boolean // also compute the depth-5000 spread
    baseUrl: string
}

export interface ApiConfig {
    port: number
    cacheMaxAgeSeconds: number
}

export const DEFAULT_BASE_URLS: Record<ExchangeId, string> = {
    binanceus: "https://api.binance.us",
    coinbase: "https://api.exchange.coinbase.com",
    kraken: "https://api.kraken.com",
    bybit: "https://api.bybit.com",
    cryptocom: "https://api.crypto.com",
}
