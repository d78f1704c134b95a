/**
 * Path: tests/composer/DailyComposer.test.ts
 */

import { parseAverageRecords } from "../../src/aggregation/MinuteAverager"
import { AverageRecord } from "../../src/aggregation/types"
import { DailyComposer, normalizeTime, parseCsv } from "../../src/composer/DailyComposer"
import { ExchangeConfig } from "../../src/config/types"
import { csvColumns } from "../../src/storage/csv"
import { MemoryBlobStore } from "../mock/MemoryBlobStore"

const HEADER = `${csvColumns(false).join(",")}\n`
const DEEP_HEADER = `${csvColumns(true).join(",")}\n`
const LEGACY_HEADER = `time,${csvColumns(false).slice(1).join(",")}\n`

const row = (timestamp: string, price: number): string =>
    `${timestamp},coinbase,ADA,${price},0.9,1.1,0.2,0.1,0.1,0.1,0.1,10,20\n`

const deepRow = (timestamp: string, deepSpread: number): string =>
    `${timestamp},kraken,BTC,50000,49999,50001,2,0.1,0.1,0.1,0.1,${deepSpread},4,6\n`

const exchange = (id: "coinbase" | "kraken"): ExchangeConfig => ({
    exchange: id,
    quote: "USD",
    symbols: {},
    deepBook: id === "kraken",
    baseUrl: "http://127.0.0.1:1",
})

const DAY = "2025-08-28"
const CSV_KEY = "coinbase/ADA/ADA-2025-08-28.csv"
const JSON_KEY = "coinbase/ADA/ADA-2025-08-28.json"

describe("DailyComposer", () => {
    let store: MemoryBlobStore
    let composer: DailyComposer

    const records = (key: string): AverageRecord[] =>
        parseAverageRecords(JSON.parse(store.text(key) ?? "null"))

    beforeEach(() => {
        store = new MemoryBlobStore()
        composer = new DailyComposer(store, [exchange("coinbase"), exchange("kraken")], ["ADA"])
    })

    it("merges both shard layouts into one time-ordered CSV", async () => {
        store.put(
            "coinbase/ADA/2025-08-28_13.csv",
            HEADER + row("2025-08-28T13:00:01.000Z", 3) + row("2025-08-28T13:00:00.000Z", 1)
        )
        store.put("coinbase/ADA/2025-08-28/seconds_H02.csv", LEGACY_HEADER + row("2025-08-28T02:00:00.000Z", 5))
        store.put("coinbase/ADA/2025-08-27_23.csv", HEADER + row("2025-08-27T23:00:00.000Z", 7))
        store.put(CSV_KEY, HEADER + row("2025-08-28T00:00:00.000Z", 9))

        await expect(composer.composeDay("coinbase", "ADA", DAY)).resolves.toBe(true)

        expect(store.text(CSV_KEY)).toBe(
            HEADER +
                row("2025-08-28T02:00:00.000Z", 5) +
                row("2025-08-28T13:00:00.000Z", 1) +
                row("2025-08-28T13:00:01.000Z", 3)
        )
        const minutes = records(JSON_KEY)
        expect(minutes.map((record) => [record.t, record.price_avg])).toEqual([
            ["2025-08-28T02:00:00Z", 5],
            ["2025-08-28T13:00:00Z", 2],
        ])
        expect(minutes[1]).toMatchObject({ bid_volume_L50_avg: 10, ask_volume_L50_avg: 20 })
        expect(minutes[1].spread_L5000_pct_avg).toBeUndefined()
    })

    it("falls back to the daily CSV and orders it", async () => {
        store.put(CSV_KEY, HEADER + row("2025-08-28T10:05:00.000Z", 4) + row("2025-08-28T10:04:59.000Z", 2))

        await expect(composer.composeDay("coinbase", "ADA", DAY)).resolves.toBe(true)

        expect(store.text(CSV_KEY)).toBe(
            HEADER + row("2025-08-28T10:04:59.000Z", 2) + row("2025-08-28T10:05:00.000Z", 4)
        )
        expect(records(JSON_KEY).map((record) => record.t)).toEqual([
            "2025-08-28T10:04:00Z",
            "2025-08-28T10:05:00Z",
        ])
        expect(store.optionsOf(CSV_KEY)?.contentDisposition).toBe('attachment; filename="ADA-2025-08-28.csv"')
    })

    it("publishes the header alone and no JSON for a day without rows", async () => {
        store.put(CSV_KEY, HEADER)

        await expect(composer.composeDay("coinbase", "ADA", DAY)).resolves.toBe(true)

        expect(store.text(CSV_KEY)).toBe(HEADER)
        expect(store.text(JSON_KEY)).toBeUndefined()
    })

    it("reports false when nothing exists for the day", async () => {
        await expect(composer.composeDay("coinbase", "ADA", DAY)).resolves.toBe(false)
        expect(store.uploads).toEqual([])
    })

    it("keeps the depth-5000 column and averages it", async () => {
        store.put(
            "kraken/BTC/2025-08-28_00.csv",
            DEEP_HEADER + deepRow("2025-08-28T00:00:00.000Z", 0.5) + deepRow("2025-08-28T00:00:01.000Z", 1.5)
        )

        await composer.composeDay("kraken", "BTC", DAY)

        expect(store.text("kraken/BTC/BTC-2025-08-28.csv")).toBe(
            DEEP_HEADER + deepRow("2025-08-28T00:00:00.000Z", 0.5) + deepRow("2025-08-28T00:00:01.000Z", 1.5)
        )
        expect(records("kraken/BTC/BTC-2025-08-28.json")).toEqual([
            {
                t: "2025-08-28T00:00:00Z",
                exchange: "kraken",
                asset: "BTC",
                price_avg: 50000,
                spread_raw_avg: 2,
                spread_L5_pct_avg: 0.1,
                spread_L20_pct_avg: 0.1,
                spread_L50_pct_avg: 0.1,
                spread_L100_pct_avg: 0.1,
                spread_L5000_pct_avg: 1,
                bid_volume_L50_avg: 4,
                ask_volume_L50_avg: 6,
            },
        ])
    })

    it("drops the depth-5000 column for exchanges without deep books", async () => {
        store.put(
            CSV_KEY,
            DEEP_HEADER + "2025-08-28T13:00:00.000Z,coinbase,ADA,1,0.9,1.1,0.2,0.1,0.1,0.1,0.1,,10,20\n"
        )

        await composer.composeDay("coinbase", "ADA", DAY)

        expect(store.text(CSV_KEY)).toBe(HEADER + row("2025-08-28T13:00:00.000Z", 1))
        const minutes = records(JSON_KEY)
        expect(minutes).toHaveLength(1)
        expect(minutes[0]).not.toHaveProperty("spread_L5000_pct_avg")
    })

    it("publishes the same files when run twice", async () => {
        store.put("coinbase/ADA/2025-08-28_13.csv", HEADER + row("2025-08-28T13:00:00.000Z", 1))

        await composer.composeDay("coinbase", "ADA", DAY)
        const firstCsv = store.text(CSV_KEY)
        const firstJson = store.text(JSON_KEY)
        await composer.composeDay("coinbase", "ADA", DAY)

        expect(store.text(CSV_KEY)).toBe(firstCsv)
        expect(store.text(JSON_KEY)).toBe(firstJson)
    })

    it("summarizes every exchange and asset", async () => {
        store.put(CSV_KEY, HEADER + row("2025-08-28T13:00:00.000Z", 1))

        await expect(composer.composeAll(DAY)).resolves.toEqual({
            day: DAY,
            published: ["coinbase/ADA"],
            empty: ["kraken/ADA"],
            failed: [],
        })

        store.failReads = true
        await expect(composer.composeAll(DAY)).resolves.toEqual({
            day: DAY,
            published: [],
            empty: [],
            failed: ["coinbase/ADA", "kraken/ADA"],
        })
    })
})

describe("CSV helpers", () => {
    it("reads rows keyed by header", () => {
        expect(parseCsv("timestamp,price\n2025-08-28T00:00:00Z,1.5\n\n")).toEqual([
            { timestamp: "2025-08-28T00:00:00Z", price: "1.5" },
        ])
    })

    it("drops rows without a usable time", () => {
        const rows = normalizeTime([
            { timestamp: "2025-08-28T00:00:02Z", price: "2" },
            { timestamp: "not a time", price: "3" },
            { time: "2025-08-28T00:00:01Z", price: "1" },
            { price: "4" },
        ])

        expect(rows).toEqual([
            { time: "2025-08-28T00:00:01Z", timestamp: "2025-08-28T00:00:01Z", price: "1" },
            { timestamp: "2025-08-28T00:00:02Z", price: "2" },
        ])
    })
})
