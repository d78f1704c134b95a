/**
 * Path: src/utils/logger.ts
 * Module-scoped winston loggers (console + daily rotating files)
 */

import winston from "winston"
import DailyRotateFile from "winston-daily-rotate-file"

export type LogMeta = Record<string, unknown>

const isTestEnv = (): boolean => process.env.NODE_ENV === "test"

export class Logger {
    private logger: winston.Logger
    private static instances: Map<string, Logger> = new Map()

    private constructor(module: string) {
        this.logger = winston.createLogger({
            level: process.env.LOG_LEVEL || "info",
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            defaultMeta: { module },
            transports: this.getTransports(),
        })
    }

    static getInstance(module: string): Logger {
        let instance = Logger.instances.get(module)
        if (!instance) {
            instance = new Logger(module)
            Logger.instances.set(module, instance)
        }
        return instance
    }

    private getTransports(): winston.transport[] {
        const consoleTransport = new winston.transports.Console({
            silent: isTestEnv(),
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.simple()
            ),
        })
        if (isTestEnv()) {
            return [consoleTransport]
        }

        const logDir = process.env.LOG_DIR || "logs"
        return [
            consoleTransport,
            new DailyRotateFile({
                filename: `${logDir}/application-%DATE%.log`,
                datePattern: "YYYY-MM-DD",
                zippedArchive: true,
                maxSize: "20m",
                maxFiles: "14d",
            }),
            // errors only
            new DailyRotateFile({
                filename: `${logDir}/error-%DATE%.log`,
                datePattern: "YYYY-MM-DD",
                zippedArchive: true,
                maxSize: "20m",
                maxFiles: "14d",
                level: "error",
            }),
        ]
    }

    info(message: string, meta?: LogMeta): void {
        this.logger.info(message, meta)
    }

    error(message: string, error?: unknown, meta?: LogMeta): void {
        this.logger.error(message, {
            ...meta,
            error: error instanceof Error ? error.message : error,
            stack: error instanceof Error ? error.stack : undefined,
        })
    }

    warn(message: string, meta?: LogMeta): void {
        this.logger.warn(message, meta)
    }

    debug(message: string, meta?: LogMeta): void {
        this.logger.debug(message, meta)
    }

    logPerformance(operation: string, duration: number, meta?: LogMeta): void {
        this.logger.info("Performance", {
            operation,
            duration,
            ...meta,
        })
    }
}
