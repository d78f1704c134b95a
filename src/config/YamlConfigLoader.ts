/**
 * Path: src/config/YamlConfigLoader.ts
 * Loads config.yaml once at startup, with .env / environment overrides
 */
import fs from "fs"
import dotenv from "dotenv"
import yaml from "js-yaml"
import { AppConfig, DEFAULT_BASE_URLS, ExchangeConfig } from "./types"
import { IConfigLoader } from "./IConfigLoader"
import { CollectorError, ErrorCode, ErrorSeverity } from "../errors/types"
import { ExchangeId, isExchangeId } from "../exchanges/common/types"

type RawRecord = Record<string, unknown>

function isRecord(value: unknown): value is RawRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isSymbolList(value: unknown): value is string[] {
    return (
        Array.isArray(value) &&
        value.length > 0 &&
        value.every((item) => typeof item === "string" && item.trim() !== "")
    )
}

function configError(message: string, code = ErrorCode.CONFIG_INVALID): CollectorError {
    return new CollectorError(code, message, undefined, ErrorSeverity.CRITICAL)
}

function readNumber(raw: RawRecord, key: string, fallback: number): number {
    const value = raw[key]
    if (value === undefined || value === null) return fallback
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
        throw configError(`'${key}' must be a positive number`)
    }
    return value
}

function readString(raw: RawRecord, key: string): string | undefined {
    const value = raw[key]
    if (value === undefined || value === null) return undefined
    if (typeof value !== "string" || value.trim() === "") {
        throw configError(`'${key}' must be a non-empty string`)
    }
    return value.trim()
}

function readBoolean(raw: RawRecord, key: string, fallback: boolean): boolean {
    const value = raw[key]
    if (value === undefined || value === null) return fallback
    if (typeof value !== "boolean") {
        throw configError(`'${key}' must be true or false`)
    }
    return value
}

export class YamlConfigLoader implements IConfigLoader {
    private readonly configPath: string

    constructor(
        configPath?: string,
        envPath?: string,
        private readonly env: NodeJS.ProcessEnv = process.env
    ) {
        if (envPath) {
            dotenv.config({ path: envPath })
        } else {
            dotenv.config()
        }
        this.configPath = configPath || this.env.CONFIG_PATH || "config.yaml"
    }

    loadConfig(): AppConfig {
        let parsed: unknown
        try {
            parsed = yaml.load(fs.readFileSync(this.configPath, "utf8"))
        } catch (error) {
            throw new CollectorError(
                ErrorCode.CONFIG_INVALID,
                `Cannot read config file ${this.configPath}`,
                error instanceof Error ? error : undefined,
                ErrorSeverity.CRITICAL
            )
        }
        if (!isRecord(parsed)) {
            throw configError(`${this.configPath} must contain a mapping`)
        }
        return this.buildConfig(parsed)
    }

    private buildConfig(raw: RawRecord): AppConfig {
        const bucket = this.env.GCS_BUCKET || readString(raw, "gcs_bucket")
        if (!bucket) {
            throw configError("'gcs_bucket' is required")
        }

        const assets = raw.assets
        if (!isSymbolList(assets)) {
            throw configError("'assets' must be a non-empty list of symbols")
        }

        const exchanges = this.buildExchanges(raw.exchanges)

        return {
            bucket,
            assets: assets.map((asset) => asset.trim().toUpperCase()),
            rowIntervalMs: readNumber(raw, "row_interval_seconds", 1) * 1000,
            uploadIntervalMs: readNumber(raw, "upload_interval_seconds", 60) * 1000,
            requestTimeoutMs: readNumber(raw, "request_timeout_ms", 5000),
            dataDir: readString(raw, "data_dir") ?? "data",
            makePublic: readBoolean(raw, "make_public", true),
            exchanges,
            api: {
                port: parseInt(this.env.PORT || "10000", 10),
                cacheMaxAgeSeconds: 300,
            },
        }
    }

    private buildExchanges(raw: unknown): ExchangeConfig[] {
        if (!isRecord(raw)) {
            throw configError("'exchanges' must be a mapping")
        }

        for (const name of Object.keys(raw)) {
            if (!isExchangeId(name)) {
                throw configError(
                    `Unsupported exchange: ${name}`,
                    ErrorCode.UNSUPPORTED_EXCHANGE
                )
            }
        }

        // EXCHANGES=coinbase,kraken narrows the selection for this process
        const selected = this.env.EXCHANGES?.split(",")
            .map((name) => name.trim().toLowerCase())
            .filter((name) => name !== "")
        for (const name of selected ?? []) {
            if (!isExchangeId(name)) {
                throw configError(
                    `Unsupported exchange: ${name}`,
                    ErrorCode.UNSUPPORTED_EXCHANGE
                )
            }
            if (!isRecord(raw[name])) {
                throw configError(`Exchange '${name}' is not configured`)
            }
        }

        const exchanges: ExchangeConfig[] = []
        for (const [name, value] of Object.entries(raw)) {
            if (!isExchangeId(name) || !isRecord(value)) continue
            const enabled = selected
                ? selected.includes(name)
                : readBoolean(value, "enabled", false)
            if (!enabled) continue
            exchanges.push(this.buildExchange(name, value))
        }

        if (exchanges.length === 0) {
            throw configError("No exchanges selected")
        }
        return exchanges
    }

    private buildExchange(exchange: ExchangeId, raw: RawRecord): ExchangeConfig {
        const quote = readString(raw, "quote")
        if (!quote) {
            throw configError(`'exchanges.${exchange}.quote' is required`)
        }

        const symbols: Record<string, string> = {}
        const rawSymbols = raw.symbols
        if (rawSymbols !== undefined && rawSymbols !== null) {
            if (!isRecord(rawSymbols)) {
                throw configError(`'exchanges.${exchange}.symbols' must be a mapping`)
            }
            for (const [asset, symbol] of Object.entries(rawSymbols)) {
                if (typeof symbol !== "string" || symbol === "") {
                    throw configError(
                        `'exchanges.${exchange}.symbols.${asset}' must be a string`
                    )
                }
                symbols[asset.toUpperCase()] = symbol.toUpperCase()
            }
        }

        return {
            exchange,
            quote: quote.toUpperCase(),
            fallbackQuote: readString(raw, "fallback_quote")?.toUpperCase(),
            symbols,
            deepBook: readBoolean(raw, "deep_book", false),
            baseUrl: readString(raw, "base_url") ?? DEFAULT_BASE_URLS[exchange],
        }
    }
}
