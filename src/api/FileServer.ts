/**
 * Path: src/api/FileServer.ts
 *
 * Read-only HTTP access to the published artifacts
 * - GET /files/json|csv?exchange&asset&day=YYYY-MM-DD
 * - GET /list/days?exchange&asset, /list/exchanges, /list/assets?exchange
 */

import express, { NextFunction, Request, RequestHandler, Response } from "express"
import cors from "cors"
import { Server } from "http"
import { ApiConfig } from "../config/types"
import { IBlobStore } from "../storage/IBlobStore"
import { assetPrefix, dailyCsvKey, dailyJsonKey, dayFromDailyKey } from "../storage/keys"
import { DAY_PATTERN } from "../utils/common"
import { Logger } from "../utils/logger"

type AsyncHandler = (req: Request, res: Response) => Promise<void>

const asyncHandler =
    (handler: AsyncHandler): RequestHandler =>
    (req, res, next) => {
        handler(req, res).catch(next)
    }

function queryParam(req: Request, name: string): string {
    const value = req.query[name]
    return typeof value === "string" ? value.trim() : ""
}

export class FileServer {
    private readonly app: express.Application
    private server: Server | null = null
    private readonly logger = Logger.getInstance("FileServer")

    constructor(
        private readonly store: IBlobStore,
        private readonly config: ApiConfig
    ) {
        this.app = express()
        this.app.use(cors())
        this.app.use((_req, res, next) => {
            res.set("Cache-Control", `public, max-age=${this.config.cacheMaxAgeSeconds}`)
            next()
        })
        this.setupRoutes()
        this.app.use(
            (error: unknown, _req: Request, res: Response, _next: NextFunction) => {
                this.logger.error("Request failed", error)
                res.status(500).json({ error: "internal error" })
            }
        )
    }

    public listen(port: number = this.config.port): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port, () => {
                const address = server.address()
                const bound = typeof address === "object" && address !== null ? address.port : port
                this.logger.info(`File API listening on port ${bound}`)
                resolve(bound)
            })
            server.once("error", reject)
            this.server = server
        })
    }

    public close(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server) {
                resolve()
                return
            }
            this.server.close((error) => (error ? reject(error) : resolve()))
            this.server = null
        })
    }

    private setupRoutes(): void {
        this.app.get("/", (_req, res) => {
            res.json({ ok: true })
        })

        this.app.get(
            "/files/json",
            asyncHandler((req, res) => this.sendDailyFile(req, res, "json"))
        )
        this.app.get(
            "/files/csv",
            asyncHandler((req, res) => this.sendDailyFile(req, res, "csv"))
        )

        this.app.get(
            "/list/days",
            asyncHandler(async (req, res) => {
                const exchange = queryParam(req, "exchange").toLowerCase()
                const asset = queryParam(req, "asset").toUpperCase()
                if (!exchange || !asset) {
                    res.status(400).json({ error: "params: exchange, asset required" })
                    return
                }
                const keys = await this.store.list(assetPrefix(exchange, asset))
                const days = new Set<string>()
                for (const key of keys) {
                    const day = dayFromDailyKey(key, asset, "json")
                    if (day) days.add(day)
                }
                res.json({ exchange, asset, days: [...days].sort() })
            })
        )

        this.app.get(
            "/list/exchanges",
            asyncHandler(async (_req, res) => {
                const keys = await this.store.list()
                const exchanges = new Set<string>()
                for (const key of keys) {
                    const parts = key.split("/")
                    if (parts.length > 1 && parts[0]) exchanges.add(parts[0])
                }
                res.json({ exchanges: [...exchanges].sort() })
            })
        )

        this.app.get(
            "/list/assets",
            asyncHandler(async (req, res) => {
                const exchange = queryParam(req, "exchange").toLowerCase()
                if (!exchange) {
                    res.status(400).json({ error: "param: exchange required" })
                    return
                }
                const keys = await this.store.list(`${exchange}/`)
                const assets = new Set<string>()
                for (const key of keys) {
                    const parts = key.split("/")
                    if (parts.length >= 3 && parts[1]) assets.add(parts[1])
                }
                res.json({ exchange, assets: [...assets].sort() })
            })
        )
    }

    private async sendDailyFile(
        req: Request,
        res: Response,
        kind: "json" | "csv"
    ): Promise<void> {
        const exchange = queryParam(req, "exchange").toLowerCase()
        const asset = queryParam(req, "asset").toUpperCase()
        const day = queryParam(req, "day")
        if (!exchange || !asset || !DAY_PATTERN.test(day)) {
            res.status(400).json({ error: "params: exchange, asset, day=YYYY-MM-DD required" })
            return
        }

        const key =
            kind === "json"
                ? dailyJsonKey(exchange, asset, day)
                : dailyCsvKey(exchange, asset, day)
        const data = await this.store.download(key)
        if (data === null) {
            res.status(404).json({ error: `not found: ${key}` })
            return
        }
        res.type(kind === "json" ? "application/json" : "text/csv").send(data)
    }
}
