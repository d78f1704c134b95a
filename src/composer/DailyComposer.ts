/**
 * Path: src/composer/DailyComposer.ts
 *
 * Publishes the canonical daily CSV + JSON for each exchange/asset
 * - merges hourly shards (YYYY-MM-DD_HH.csv or YYYY-MM-DD/seconds_HHH.csv, e.g. seconds_H08.csv)
 * - without shards, re-publishes the existing daily CSV
 * - the JSON is rebuilt as minute averages from the merged rows
 * Running it twice for the same day publishes the same files.
 */

import cron, { ScheduledTask } from "node-cron"
import { parse } from "csv-parse/sync"
import { MinuteAverager } from "../aggregation/MinuteAverager"
import { AverageRecord } from "../aggregation/types"
import { ExchangeConfig } from "../config/types"
import { uploadDailyCsv, uploadDailyJson } from "../storage/artifacts"
import { DEEP_SPREAD_COLUMN, csvColumns, toCsvLine } from "../storage/csv"
import { IBlobStore } from "../storage/IBlobStore"
import { assetPrefix, dailyCsvKey, matchShardKeys } from "../storage/keys"
import { previousUtcDay, toUtcDate } from "../utils/common"
import { Logger } from "../utils/logger"

export type CsvRow = Record<string, string>

interface TimedRow {
    time: Date
    row: CsvRow
}

export interface ComposeSummary {
    day: string
    published: string[]
    empty: string[]
    failed: string[]
}

// 00:03 UTC, for the day that just ended
export const COMPOSE_SCHEDULE = "3 0 * * *"

function isCsvRow(value: unknown): value is CsvRow {
    return (
        typeof value === "object" &&
        value !== null &&
        Object.values(value).every((field) => typeof field === "string")
    )
}

export function parseCsv(data: Buffer | string): CsvRow[] {
    const parsed: unknown = parse(data, {
        columns: true,
        skip_empty_lines: true,
        relax_column_count: true,
    })
    if (!Array.isArray(parsed)) return []
    return parsed.filter(isCsvRow)
}

function toNumber(value: string | undefined): number | null {
    if (value === undefined || value.trim() === "") return null
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : null
}

/** Sorts rows by their `timestamp` (or legacy `time`) column, dropping unparseable ones. */
export function normalizeTime(rows: CsvRow[]): CsvRow[] {
    const timed: TimedRow[] = []
    for (const row of rows) {
        const raw = row.timestamp ?? row.time
        if (raw === undefined) continue
        const time = toUtcDate(raw)
        if (time === null) continue
        timed.push({ time, row: { ...row, timestamp: raw } })
    }
    return timed
        .sort((a, b) => a.time.getTime() - b.time.getTime())
        .map((entry) => entry.row)
}

/** Replays per-second rows through a MinuteAverager, closing the last minute too. */
export function minuteRecordsFromRows(
    exchange: string,
    asset: string,
    rows: CsvRow[],
    deepBook: boolean
): AverageRecord[] {
    const averager = new MinuteAverager()
    for (const row of rows) {
        averager.add({
            exchange,
            asset,
            timestamp: row.timestamp,
            price: toNumber(row.price),
            spreadRaw: toNumber(row.spread_raw),
            spreadPct5: toNumber(row.spread_L5_pct),
            spreadPct20: toNumber(row.spread_L20_pct),
            spreadPct50: toNumber(row.spread_L50_pct),
            spreadPct100: toNumber(row.spread_L100_pct),
            spreadPct5000: deepBook ? toNumber(row[DEEP_SPREAD_COLUMN]) : undefined,
            bidVolume50: toNumber(row.bid_volume_L50),
            askVolume50: toNumber(row.ask_volume_L50),
        })
    }
    const key = MinuteAverager.seriesKey(exchange, asset)
    averager.finalize(key)
    return averager.getSeries(key)
}

export class DailyComposer {
    private readonly logger = Logger.getInstance("DailyComposer")

    constructor(
        private readonly store: IBlobStore,
        private readonly exchanges: ExchangeConfig[],
        private readonly assets: string[]
    ) {}

    async composeDay(exchange: string, asset: string, day: string): Promise<boolean> {
        let rows = await this.readShards(exchange, asset, day)

        const singleKey = dailyCsvKey(exchange, asset, day)
        if (rows === null) {
            const single = await this.store.download(singleKey)
            if (single !== null) {
                rows = parseCsv(single)
            }
        }
        if (rows === null) {
            return false
        }

        const ordered = normalizeTime(rows)
        // configured exchanges decide; the header only for ones outside the config
        const deepBook =
            this.exchanges.find((config) => config.exchange === exchange)?.deepBook ??
            ordered.some((row) => row[DEEP_SPREAD_COLUMN] !== undefined)
        const columns = csvColumns(deepBook)
        const csv = [columns, ...ordered.map((row) => columns.map((column) => row[column] ?? ""))]
            .map(toCsvLine)
            .join("")

        await uploadDailyCsv(this.store, exchange, asset, day, Buffer.from(csv, "utf8"))
        this.logger.info("Published daily CSV", { key: singleKey, rows: ordered.length })

        if (ordered.length > 0) {
            const records = minuteRecordsFromRows(exchange, asset, ordered, deepBook)
            const jsonKey = await uploadDailyJson(this.store, exchange, asset, day, records)
            this.logger.info("Published daily JSON", { key: jsonKey, minutes: records.length })
        } else {
            this.logger.info("JSON skipped (0 rows)", { exchange, asset, day })
        }
        return true
    }

    async composeAll(day: string): Promise<ComposeSummary> {
        const summary: ComposeSummary = { day, published: [], empty: [], failed: [] }
        for (const { exchange } of this.exchanges) {
            for (const asset of this.assets) {
                const id = `${exchange}/${asset}`
                try {
                    const ok = await this.composeDay(exchange, asset, day)
                    if (ok) {
                        summary.published.push(id)
                    } else {
                        summary.empty.push(id)
                    }
                    this.logger.info(`${day} ${id} -> ${ok ? "OK" : "no parts"}`)
                } catch (error) {
                    summary.failed.push(id)
                    this.logger.error(`${day} ${id} compose failed`, error)
                }
            }
        }
        return summary
    }

    scheduleDaily(): ScheduledTask {
        this.logger.info("Scheduling daily composition", { cron: COMPOSE_SCHEDULE })
        return cron.schedule(
            COMPOSE_SCHEDULE,
            () => {
                const day = previousUtcDay(new Date())
                this.composeAll(day).catch((error: unknown) =>
                    this.logger.error(`Composition of ${day} failed`, error)
                )
            },
            { timezone: "Etc/UTC" }
        )
    }

    // null when no shard exists or none could be read
    private async readShards(exchange: string, asset: string, day: string): Promise<CsvRow[] | null> {
        const keys = await this.store.list(assetPrefix(exchange, asset))
        const shards = matchShardKeys(keys, exchange, asset, day)
        if (shards.length === 0) return null

        const rows: CsvRow[] = []
        let read = 0
        for (const shard of shards) {
            try {
                const data = await this.store.download(shard.key)
                if (data === null) continue
                rows.push(...parseCsv(data))
                read += 1
            } catch (error) {
                this.logger.warn("Shard read failed", {
                    key: shard.key,
                    error: error instanceof Error ? error.message : String(error),
                })
            }
        }
        return read > 0 ? rows : null
    }
}
