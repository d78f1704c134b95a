/**
 * Path: src/main.ts
 * Purpose: order-book logger process (poll loop) start-up and shutdown
 */

import { MinuteAverager } from "./aggregation/MinuteAverager"
import { OrderBookLogger } from "./collectors/OrderBookLogger"
import { IConfigLoader } from "./config/IConfigLoader"
import { AppConfig } from "./config/types"
import { YamlConfigLoader } from "./config/YamlConfigLoader"
import { ErrorHandler } from "./errors/ErrorHandler"
import { CollectorError, ErrorSeverity } from "./errors/types"
import { createAdapters } from "./exchanges/AdapterRegistry"
import { GcsBlobStore } from "./storage/gcs/GcsBlobStore"
import { Logger } from "./utils/logger"

const logger = Logger.getInstance("Application")

export function logCollectorError(error: CollectorError, source?: string): void {
    const meta = {
        code: error.code,
        severity: error.severity,
        source,
        cause: error.originalError?.message,
    }
    if (error.severity === ErrorSeverity.LOW) {
        logger.debug(error.message, meta)
    } else {
        logger.warn(error.message, meta)
    }
}

class Application {
    private isRunning: boolean = false
    private isShuttingDown: boolean = false

    constructor(
        private readonly config: AppConfig,
        private readonly orderBookLogger: OrderBookLogger
    ) {}

    static create(configLoader: IConfigLoader = new YamlConfigLoader()): Application {
        const config = configLoader.loadConfig()
        let app: Application | null = null

        const errorHandler = new ErrorHandler(async () => {
            logger.error("Fatal error occurred, shutting down")
            if (app) await app.shutdown()
            process.exit(1)
        }, logCollectorError)

        const store = new GcsBlobStore({
            bucket: config.bucket,
            makePublic: config.makePublic,
        })
        const orderBookLogger = new OrderBookLogger(
            config,
            createAdapters(config.exchanges, config.requestTimeoutMs),
            new MinuteAverager(),
            store,
            errorHandler
        )

        app = new Application(config, orderBookLogger)
        return app
    }

    public start(): void {
        if (this.isRunning) return
        logger.info("Starting order book logger", {
            bucket: this.config.bucket,
            exchanges: this.config.exchanges.map((exchange) => exchange.exchange),
            assets: this.config.assets,
        })
        this.orderBookLogger.start()
        this.setupSignalHandlers()
        this.isRunning = true
    }

    private setupSignalHandlers(): void {
        const shutdownHandler = async (signal: string) => {
            if (this.isShuttingDown) return
            this.isShuttingDown = true

            logger.info(`Received ${signal}. Initiating graceful shutdown...`)
            await this.shutdown()
            process.exit(0)
        }

        process.on("SIGINT", () => {
            shutdownHandler("SIGINT").catch((error: unknown) => {
                logger.error("Shutdown failed", error)
                process.exit(1)
            })
        })
        process.on("SIGTERM", () => {
            shutdownHandler("SIGTERM").catch((error: unknown) => {
                logger.error("Shutdown failed", error)
                process.exit(1)
            })
        })
    }

    public async shutdown(): Promise<void> {
        if (!this.isRunning) return
        this.isRunning = false
        logger.info("Shutting down... uploading current day")
        await this.orderBookLogger.stop()
        logger.info("Shutdown process completed.")
    }

    public getStatus(): string {
        return this.isRunning ? "running" : "stopped"
    }
}

function main(): void {
    try {
        Application.create().start()
    } catch (error) {
        logger.error("Application failed to start", error)
        process.exit(1)
    }
}

if (require.main === module) {
    main()
}

export { Application }
