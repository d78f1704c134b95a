/**
 * Path: tests/exchanges/AdapterRegistry.test.ts
 */

import { ExchangeConfig } from "../../src/config/types"
import { createAdapter, createAdapters } from "../../src/exchanges/AdapterRegistry"
import { BinanceUsAdapter } from "../../src/exchanges/binanceus/BinanceUsAdapter"
import { BybitAdapter } from "../../src/exchanges/bybit/BybitAdapter"
import { CoinbaseAdapter } from "../../src/exchanges/coinbase/CoinbaseAdapter"
import { ExchangeId } from "../../src/exchanges/common/types"
import { CryptoComAdapter } from "../../src/exchanges/cryptocom/CryptoComAdapter"
import { KrakenAdapter } from "../../src/exchanges/kraken/KrakenAdapter"

const exchangeConfig = (exchange: ExchangeId): ExchangeConfig => ({
    exchange,
    quote: "USD",
    symbols: {},
    deepBook: false,
    baseUrl: "http://127.0.0.1:1",
})

describe("AdapterRegistry", () => {
    it.each([
        ["binanceus", BinanceUsAdapter],
        ["coinbase", CoinbaseAdapter],
        ["kraken", KrakenAdapter],
        ["bybit", BybitAdapter],
        ["cryptocom", CryptoComAdapter],
    ] as const)("resolves %s to its adapter", (exchange, adapterClass) => {
        const adapter = createAdapter(exchangeConfig(exchange), 1000)

        expect(adapter).toBeInstanceOf(adapterClass)
        expect(adapter.exchange).toBe(exchange)
    })

    it("builds one adapter per configured exchange", () => {
        const adapters = createAdapters(
            [exchangeConfig("coinbase"), exchangeConfig("kraken")],
            1000
        )

        expect([...adapters.keys()]).toEqual(["coinbase", "kraken"])
    })
})
