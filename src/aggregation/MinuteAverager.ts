/**
 * Path: src/aggregation/MinuteAverager.ts
 *
 * Rolls per-second ticks into one averaged record per UTC minute and key.
 * - A tick with a new minute bucket closes the open minute into the series
 * - Series hold at most one day of minutes (1440), oldest dropped first
 * - replaceSeries() seeds a key from persisted JSON and drops the open minute
 *
 * Every metric shares the tick count n: a null value adds 0 but still counts,
 * which pulls the average toward 0 during gaps. Consumers of the published
 * JSON rely on this, so it is kept as is.
 *
 * Ticks for one key must arrive in timestamp order. A late tick from an
 * already-closed minute opens a fresh accumulator for that old bucket.
 */

import { minuteBucket } from "../utils/common"
import { AverageRecord, MinuteTick, PendingMinute } from "./types"

export const MAX_SERIES_LENGTH = 1440

interface MinuteAccumulator {
    bucket: string
    exchange: string
    asset: string
    n: number
    priceSum: number
    spreadRawSum: number
    s5Sum: number
    s20Sum: number
    s50Sum: number
    s100Sum: number
    s5000Sum?: number // present when the opening tick carried a depth-5000 value
    bidVolume50Sum: number
    askVolume50Sum: number
}

const valueOf = (x: number | null | undefined): number =>
    x === null || x === undefined || !Number.isFinite(x) ? 0 : x

export class MinuteAverager {
    private readonly pending = new Map<string, MinuteAccumulator>()
    private readonly series = new Map<string, AverageRecord[]>()

    static seriesKey(exchange: string, asset: string): string {
        return `${exchange}:${asset}`
    }

    add(tick: MinuteTick): void {
        const bucket = minuteBucket(tick.timestamp)
        if (bucket === null) return

        const key = MinuteAverager.seriesKey(tick.exchange, tick.asset)
        if (!this.series.has(key)) {
            this.series.set(key, [])
        }

        const current = this.pending.get(key)
        if (current === undefined || current.bucket !== bucket) {
            if (current !== undefined) {
                this.append(key, this.toRecord(current))
            }
            this.pending.set(key, this.start(bucket, tick))
        } else {
            this.update(current, tick)
        }
    }

    replaceSeries(key: string, records: readonly AverageRecord[]): void {
        this.series.set(key, records.slice(-MAX_SERIES_LENGTH).map((r) => ({ ...r })))
        this.pending.delete(key)
    }

    /** Closes the open minute for `key` now instead of on the next rollover. */
    finalize(key: string): AverageRecord | undefined {
        const current = this.pending.get(key)
        if (current === undefined) return undefined
        this.pending.delete(key)
        const record = this.toRecord(current)
        this.append(key, record)
        return record
    }

    getSeries(key: string): AverageRecord[] {
        return [...(this.series.get(key) ?? [])]
    }

    getPending(key: string): PendingMinute | undefined {
        const current = this.pending.get(key)
        if (current === undefined) return undefined
        return {
            bucket: current.bucket,
            exchange: current.exchange,
            asset: current.asset,
            n: current.n,
        }
    }

    keys(): string[] {
        return [...this.series.keys()]
    }

    private append(key: string, record: AverageRecord): void {
        const list = this.series.get(key) ?? []
        list.push(record)
        if (list.length > MAX_SERIES_LENGTH) {
            list.splice(0, list.length - MAX_SERIES_LENGTH)
        }
        this.series.set(key, list)
    }

    private start(bucket: string, tick: MinuteTick): MinuteAccumulator {
        const accumulator: MinuteAccumulator = {
            bucket,
            exchange: tick.exchange,
            asset: tick.asset,
            n: 1,
            priceSum: valueOf(tick.price),
            spreadRawSum: valueOf(tick.spreadRaw),
            s5Sum: valueOf(tick.spreadPct5),
            s20Sum: valueOf(tick.spreadPct20),
            s50Sum: valueOf(tick.spreadPct50),
            s100Sum: valueOf(tick.spreadPct100),
            bidVolume50Sum: valueOf(tick.bidVolume50),
            askVolume50Sum: valueOf(tick.askVolume50),
        }
        if (tick.spreadPct5000 !== undefined) {
            accumulator.s5000Sum = valueOf(tick.spreadPct5000)
        }
        return accumulator
    }

    private update(acc: MinuteAccumulator, tick: MinuteTick): void {
        acc.n += 1
        acc.priceSum += valueOf(tick.price)
        acc.spreadRawSum += valueOf(tick.spreadRaw)
        acc.s5Sum += valueOf(tick.spreadPct5)
        acc.s20Sum += valueOf(tick.spreadPct20)
        acc.s50Sum += valueOf(tick.spreadPct50)
        acc.s100Sum += valueOf(tick.spreadPct100)
        if (acc.s5000Sum !== undefined) {
            acc.s5000Sum += valueOf(tick.spreadPct5000)
        }
        acc.bidVolume50Sum += valueOf(tick.bidVolume50)
        acc.askVolume50Sum += valueOf(tick.askVolume50)
    }

    private toRecord(acc: MinuteAccumulator): AverageRecord {
        const n = Math.max(1, acc.n)
        const record: AverageRecord = {
            t: acc.bucket,
            exchange: acc.exchange,
            asset: acc.asset,
            price_avg: acc.priceSum / n,
            spread_raw_avg: acc.spreadRawSum / n,
            spread_L5_pct_avg: acc.s5Sum / n,
            spread_L20_pct_avg: acc.s20Sum / n,
            spread_L50_pct_avg: acc.s50Sum / n,
            spread_L100_pct_avg: acc.s100Sum / n,
            bid_volume_L50_avg: acc.bidVolume50Sum / n,
            ask_volume_L50_avg: acc.askVolume50Sum / n,
        }
        if (acc.s5000Sum !== undefined) {
            record.spread_L5000_pct_avg = acc.s5000Sum / n
        }
        return record
    }
}

const NUMERIC_FIELDS = [
    "price_avg",
    "spread_raw_avg",
    "spread_L5_pct_avg",
    "spread_L20_pct_avg",
    "spread_L50_pct_avg",
    "spread_L100_pct_avg",
    "bid_volume_L50_avg",
    "ask_volume_L50_avg",
] as const

export function isAverageRecord(value: unknown): value is AverageRecord {
    if (typeof value !== "object" || value === null) return false
    const row: Record<string, unknown> = { ...value }
    if (
        typeof row.t !== "string" ||
        typeof row.exchange !== "string" ||
        typeof row.asset !== "string"
    ) {
        return false
    }
    if (!NUMERIC_FIELDS.every((field) => typeof row[field] === "number")) {
        return false
    }
    return (
        row.spread_L5000_pct_avg === undefined ||
        typeof row.spread_L5000_pct_avg === "number"
    )
}

/** Keeps the well-formed records of a persisted JSON artifact, in order. */
export function parseAverageRecords(data: unknown): AverageRecord[] {
    if (!Array.isArray(data)) return []
    return data.filter(isAverageRecord)
}
