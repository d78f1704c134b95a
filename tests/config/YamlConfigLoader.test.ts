/**
 * Path: tests/config/YamlConfigLoader.test.ts
 */

import fs from "fs"
import os from "os"
import path from "path"
import { YamlConfigLoader } from "../../src/config/YamlConfigLoader"
import { CollectorError, ErrorCode } from "../../src/errors/types"

const BASE_CONFIG = `
gcs_bucket: test-bucket
assets: [btc, ADA]
row_interval_seconds: 2
upload_interval_seconds: 30
data_dir: /tmp/liquidity
exchanges:
  coinbase:
    enabled: true
    quote: usd
  binanceus:
    enabled: true
    quote: USDT
    fallback_quote: usd
    deep_book: true
  kraken:
    enabled: false
    quote: USD
    deep_book: true
    symbols:
      btc: xbt
`

function errorCodeOf(load: () => unknown): ErrorCode | undefined {
    try {
        load()
    } catch (error) {
        if (error instanceof CollectorError) return error.code
        throw error
    }
    return undefined
}

describe("YamlConfigLoader", () => {
    let dir: string

    const writeConfig = (text: string): string => {
        const file = path.join(dir, "config.yaml")
        fs.writeFileSync(file, text)
        return file
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "liquidity-config-"))
    })

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true })
    })

    it("loads the enabled exchanges with defaults applied", () => {
        const config = new YamlConfigLoader(writeConfig(BASE_CONFIG), undefined, {}).loadConfig()

        expect(config.bucket).toBe("test-bucket")
        expect(config.assets).toEqual(["BTC", "ADA"])
        expect(config.rowIntervalMs).toBe(2000)
        expect(config.uploadIntervalMs).toBe(30000)
        expect(config.requestTimeoutMs).toBe(5000)
        expect(config.dataDir).toBe("/tmp/liquidity")
        expect(config.makePublic).toBe(true)
        expect(config.api).toEqual({ port: 10000, cacheMaxAgeSeconds: 300 })
        expect(config.exchanges).toEqual([
            {
                exchange: "coinbase",
                quote: "USD",
                fallbackQuote: undefined,
                symbols: {},
                deepBook: false,
                baseUrl: "https://api.exchange.coinbase.com",
            },
            {
                exchange: "binanceus",
                quote: "USDT",
                fallbackQuote: "USD",
                symbols: {},
                deepBook: true,
                baseUrl: "https://api.binance.us",
            },
        ])
    })

    it("lets the environment choose exchanges, bucket and port", () => {
        const config = new YamlConfigLoader(writeConfig(BASE_CONFIG), undefined, {
            EXCHANGES: "Kraken",
            GCS_BUCKET: "other-bucket",
            PORT: "8080",
        }).loadConfig()

        expect(config.bucket).toBe("other-bucket")
        expect(config.api.port).toBe(8080)
        expect(config.exchanges).toHaveLength(1)
        expect(config.exchanges[0].exchange).toBe("kraken")
        expect(config.exchanges[0].symbols).toEqual({ BTC: "XBT" })
    })

    it("reads the path from CONFIG_PATH", () => {
        const file = writeConfig(BASE_CONFIG)

        const config = new YamlConfigLoader(undefined, undefined, { CONFIG_PATH: file }).loadConfig()

        expect(config.bucket).toBe("test-bucket")
    })

    it("rejects unknown exchanges", () => {
        const file = writeConfig(`${BASE_CONFIG}  bitfinex:\n    enabled: true\n    quote: USD\n`)

        expect(errorCodeOf(() => new YamlConfigLoader(file, undefined, {}).loadConfig())).toBe(
            ErrorCode.UNSUPPORTED_EXCHANGE
        )
        expect(
            errorCodeOf(() =>
                new YamlConfigLoader(writeConfig(BASE_CONFIG), undefined, {
                    EXCHANGES: "coinbase,ftx",
                }).loadConfig()
            )
        ).toBe(ErrorCode.UNSUPPORTED_EXCHANGE)
    })

    it.each([
        ["a missing bucket", BASE_CONFIG.replace("gcs_bucket: test-bucket", "")],
        ["an empty asset list", BASE_CONFIG.replace("assets: [btc, ADA]", "assets: []")],
        ["a negative interval", BASE_CONFIG.replace("row_interval_seconds: 2", "row_interval_seconds: -1")],
        ["no enabled exchange", BASE_CONFIG.replace(/enabled: true/g, "enabled: false")],
        ["a scalar document", "just text"],
    ])("rejects %s", (_name, text) => {
        expect(errorCodeOf(() => new YamlConfigLoader(writeConfig(text), undefined, {}).loadConfig())).toBe(
            ErrorCode.CONFIG_INVALID
        )
    })

    it("fails on a missing file", () => {
        const loader = new YamlConfigLoader(path.join(dir, "absent.yaml"), undefined, {})

        expect(errorCodeOf(() => loader.loadConfig())).toBe(ErrorCode.CONFIG_INVALID)
    })
})
