/**
 * Path: src/collectors/OrderBookLogger.ts
 *
 * Poll loop
 * - fetches every enabled (exchange, asset) order book concurrently each tick
 * - appends one CSV row per book and feeds the minute averager
 * - uploads the day's CSV and minute JSON on the upload interval
 * - resumes the day's files from the bucket on start and at UTC midnight
 */

import fs from "fs/promises"
import path from "path"
import { MinuteAverager } from "../aggregation/MinuteAverager"
import { AppConfig } from "../config/types"
import { IErrorHandler } from "../errors/ErrorHandler"
import { CollectorError, ErrorCode, ErrorSeverity } from "../errors/types"
import { isEmptyOrderBook } from "../exchanges/common/orderbook"
import { ExchangeId, NormalizedOrderBook } from "../exchanges/common/types"
import { IOrderBookAdapter } from "../exchanges/OrderBookAdapter"
import { computeTickMetrics } from "../metrics/TickMetrics"
import { loadDailyJson, uploadDailyCsvFile, uploadDailyJson } from "../storage/artifacts"
import { appendCsvRow, ensureCsvHeader, fileExists, formatTickRow } from "../storage/csv"
import { IBlobStore } from "../storage/IBlobStore"
import { dailyCsvKey, localDailyCsvPath } from "../storage/keys"
import { sleep, utcDay } from "../utils/common"
import { Logger } from "../utils/logger"
import { CollectorPair, CycleResult } from "./types"

type FetchOutcome =
    | { pair: CollectorPair; book: NormalizedOrderBook }
    | { pair: CollectorPair; error: unknown }

export class OrderBookLogger {
    private readonly logger = Logger.getInstance("OrderBookLogger")
    private readonly pairs: CollectorPair[]
    private readonly preparedDay = new Map<string, string>()
    private currentDay: string | null = null
    private lastUploadAt: number | null = null
    private running = false
    private loop: Promise<void> | null = null

    constructor(
        private readonly config: AppConfig,
        private readonly adapters: Map<ExchangeId, IOrderBookAdapter>,
        private readonly averager: MinuteAverager,
        private readonly store: IBlobStore,
        private readonly errorHandler: IErrorHandler,
        private readonly clock: () => Date = () => new Date()
    ) {
        this.pairs = config.exchanges.flatMap((exchange) =>
            config.assets.map((asset) => ({
                id: MinuteAverager.seriesKey(exchange.exchange, asset),
                exchange,
                asset,
            }))
        )
    }

    public getPairs(): CollectorPair[] {
        return [...this.pairs]
    }

    public isRunning(): boolean {
        return this.running
    }

    public start(): void {
        if (this.running) return
        this.running = true
        this.logger.info("Starting poll loop", {
            pairs: this.pairs.map((pair) => pair.id),
            rowIntervalMs: this.config.rowIntervalMs,
            uploadIntervalMs: this.config.uploadIntervalMs,
        })
        this.loop = this.runLoop()
    }

    /** Stops after the running cycle and pushes the current day once more. */
    public async stop(): Promise<void> {
        if (!this.running) return
        this.running = false
        await this.loop
        this.loop = null
        if (this.currentDay !== null) {
            await this.uploadAll(this.currentDay)
        }
        this.logger.info("Poll loop stopped")
    }

    public async runCycle(): Promise<CycleResult> {
        const startedAt = Date.now()
        const now = this.clock()
        const timestamp = now.toISOString()
        const day = utcDay(now)

        await this.rollover(day)

        const active = this.pairs.filter((pair) => this.preparedDay.get(pair.id) === day)
        const outcomes = await this.fetchAll(active)

        const result: CycleResult = {
            day,
            recorded: 0,
            skipped: this.pairs.length - active.length,
            failed: 0,
            uploaded: false,
        }

        for (const outcome of outcomes) {
            if ("error" in outcome) {
                result.failed += 1
                this.errorHandler.handleAdapterError(outcome.pair.id, outcome.error)
                continue
            }
            if (isEmptyOrderBook(outcome.book)) {
                result.skipped += 1
                continue
            }
            if (await this.record(outcome.pair, day, timestamp, outcome.book)) {
                result.recorded += 1
            }
        }

        const nowMs = now.getTime()
        if (this.lastUploadAt === null || nowMs - this.lastUploadAt >= this.config.uploadIntervalMs) {
            await this.uploadAll(day)
            this.lastUploadAt = nowMs
            result.uploaded = true
        }

        this.logger.logPerformance("cycle", Date.now() - startedAt, {
            recorded: result.recorded,
            failed: result.failed,
        })
        return result
    }

    /** Uploads each prepared pair's CSV and minute JSON for `day`. */
    public async uploadAll(day: string): Promise<number> {
        let uploaded = 0
        for (const pair of this.pairs) {
            if (this.preparedDay.get(pair.id) !== day) continue
            const exchange = pair.exchange.exchange
            try {
                await uploadDailyCsvFile(this.store, exchange, pair.asset, day, this.csvPath(pair, day))
                await uploadDailyJson(
                    this.store,
                    exchange,
                    pair.asset,
                    day,
                    this.averager.getSeries(pair.id)
                )
                uploaded += 1
            } catch (error) {
                // local CSV stays; the next interval retries
                this.errorHandler.handleError(error)
            }
        }
        this.logger.debug("Upload finished", { day, uploaded })
        return uploaded
    }

    private async runLoop(): Promise<void> {
        while (this.running) {
            const startedAt = Date.now()
            try {
                await this.runCycle()
            } catch (error) {
                this.errorHandler.handleError(error)
            }
            const elapsed = Date.now() - startedAt
            if (this.running) {
                await sleep(Math.max(0, this.config.rowIntervalMs - elapsed))
            }
        }
    }

    private async rollover(day: string): Promise<void> {
        const previous = this.currentDay
        if (previous !== null && previous !== day) {
            this.logger.info("UTC day rollover", { from: previous, to: day })
            for (const pair of this.pairs) {
                if (this.preparedDay.get(pair.id) === previous) {
                    this.averager.finalize(pair.id)
                }
            }
            await this.uploadAll(previous)
        }
        this.currentDay = day

        for (const pair of this.pairs) {
            if (this.preparedDay.get(pair.id) === day) continue
            try {
                await this.prepare(pair, day)
                this.preparedDay.set(pair.id, day)
            } catch (error) {
                // retried next cycle; the pair is not polled until then
                this.errorHandler.handleError(error)
            }
        }
    }

    private async prepare(pair: CollectorPair, day: string): Promise<void> {
        const exchange = pair.exchange.exchange
        const localPath = this.csvPath(pair, day)

        if (!(await fileExists(localPath))) {
            const remote = await this.store.download(dailyCsvKey(exchange, pair.asset, day))
            if (remote !== null) {
                await fs.mkdir(path.dirname(localPath), { recursive: true })
                await fs.writeFile(localPath, remote)
                this.logger.info("Resumed CSV from bucket", { pair: pair.id, day })
            } else {
                await ensureCsvHeader(localPath, pair.exchange.deepBook)
            }
        }

        const records = await loadDailyJson(this.store, exchange, pair.asset, day)
        this.averager.replaceSeries(pair.id, records)
        if (records.length > 0) {
            this.logger.info("Resumed minute series from bucket", {
                pair: pair.id,
                day,
                minutes: records.length,
            })
        }
    }

    private async fetchAll(pairs: CollectorPair[]): Promise<FetchOutcome[]> {
        const settled = await Promise.allSettled(
            pairs.map((pair) => {
                const adapter = this.adapters.get(pair.exchange.exchange)
                if (!adapter) {
                    // missing adapter is fatal
                    return Promise.reject(
                        new CollectorError(
                            ErrorCode.UNSUPPORTED_EXCHANGE,
                            `No adapter registered for ${pair.exchange.exchange}`,
                            undefined,
                            ErrorSeverity.CRITICAL
                        )
                    )
                }
                return adapter.fetchOrderBook(pair.asset, pair.exchange.quote)
            })
        )
        return settled.map((outcome, index): FetchOutcome =>
            outcome.status === "fulfilled"
                ? { pair: pairs[index], book: outcome.value }
                : { pair: pairs[index], error: outcome.reason }
        )
    }

    private async record(
        pair: CollectorPair,
        day: string,
        timestamp: string,
        book: NormalizedOrderBook
    ): Promise<boolean> {
        const exchange = pair.exchange.exchange
        const deepBook = pair.exchange.deepBook
        const metrics = computeTickMetrics(book, { deepBook })

        try {
            await appendCsvRow(
                this.csvPath(pair, day),
                formatTickRow(timestamp, exchange, pair.asset, metrics, deepBook)
            )
        } catch (error) {
            this.errorHandler.handleError(error)
            return false
        }

        this.averager.add({
            exchange,
            asset: pair.asset,
            timestamp,
            price: metrics.price,
            spreadRaw: metrics.spreadRaw,
            spreadPct5: metrics.spreadPct5,
            spreadPct20: metrics.spreadPct20,
            spreadPct50: metrics.spreadPct50,
            spreadPct100: metrics.spreadPct100,
            spreadPct5000: metrics.spreadPct5000,
            bidVolume50: metrics.bidVolume50,
            askVolume50: metrics.askVolume50,
        })
        return true
    }

    private csvPath(pair: CollectorPair, day: string): string {
        return localDailyCsvPath(this.config.dataDir, pair.exchange.exchange, pair.asset, day)
    }
}
