/**
 * Path: src/storage/csv.ts
 * Per-second CSV rows written by the logger
 */
import fs from "fs/promises"
import path from "path"
import { TickMetrics } from "../metrics/TickMetrics"

const BASE_COLUMNS = [
    "timestamp",
    "exchange",
    "asset",
    "price",
    "best_bid",
    "best_ask",
    "spread_raw",
    "spread_L5_pct",
    "spread_L20_pct",
    "spread_L50_pct",
    "spread_L100_pct",
] as const

const VOLUME_COLUMNS = ["bid_volume_L50", "ask_volume_L50"] as const

export const DEEP_SPREAD_COLUMN = "spread_L5000_pct"

export function csvColumns(deepBook: boolean): string[] {
    return deepBook
        ? [...BASE_COLUMNS, DEEP_SPREAD_COLUMN, ...VOLUME_COLUMNS]
        : [...BASE_COLUMNS, ...VOLUME_COLUMNS]
}

export function formatFloat(value: number | null | undefined): string {
    return value === null || value === undefined || !Number.isFinite(value)
        ? ""
        : value.toFixed(10)
}

function escapeField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export function toCsvLine(fields: string[]): string {
    return fields.map(escapeField).join(",") + "\n"
}

export function formatTickRow(
    timestamp: string,
    exchange: string,
    asset: string,
    metrics: TickMetrics,
    deepBook: boolean
): string[] {
    const row = [
        timestamp,
        exchange,
        asset,
        formatFloat(metrics.price),
        formatFloat(metrics.bestBid),
        formatFloat(metrics.bestAsk),
        formatFloat(metrics.spreadRaw),
        formatFloat(metrics.spreadPct5),
        formatFloat(metrics.spreadPct20),
        formatFloat(metrics.spreadPct50),
        formatFloat(metrics.spreadPct100),
    ]
    if (deepBook) {
        row.push(formatFloat(metrics.spreadPct5000))
    }
    row.push(formatFloat(metrics.bidVolume50), formatFloat(metrics.askVolume50))
    return row
}

export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath)
        return true
    } catch {
        return false
    }
}

export async function ensureCsvHeader(filePath: string, deepBook: boolean): Promise<void> {
    if (await fileExists(filePath)) return
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, toCsvLine(csvColumns(deepBook)), "utf8")
}

export async function appendCsvRow(filePath: string, row: string[]): Promise<void> {
    await fs.appendFile(filePath, toCsvLine(row), "utf8")
}
