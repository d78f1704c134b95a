/**
 * Path: src/errors/ErrorHandler.ts
 */

import { CollectorError, ErrorCode, ErrorSeverity } from "./types"

export interface IErrorHandler {
    handleError(error: unknown): CollectorError
    handleFatalError(error: Error): void
    handleAdapterError(source: string, error: unknown): CollectorError
}

export class ErrorHandler implements IErrorHandler {
    constructor(
        private readonly onFatalError: () => Promise<void>,
        private readonly onError: (error: CollectorError, source?: string) => void
    ) {}

    handleError(error: unknown): CollectorError {
        const collectorError = this.normalizeError(error)
        this.onError(collectorError)
        return collectorError
    }

    handleFatalError(error: Error): void {
        const collectorError =
            error instanceof CollectorError
                ? error
                : new CollectorError(
                      ErrorCode.INTERNAL_ERROR,
                      "Fatal error occurred",
                      error,
                      ErrorSeverity.CRITICAL
                  )
        this.onError(collectorError)
        this.onFatalError().catch((fatalError: unknown) => {
            this.onError(this.normalizeError(fatalError))
        })
    }

    // A failed fetch skips one asset for one tick; only CRITICAL escalates.
    handleAdapterError(source: string, error: unknown): CollectorError {
        const collectorError = this.normalizeError(error)
        if (this.isCriticalError(collectorError)) {
            this.handleFatalError(collectorError)
        } else {
            this.onError(collectorError, source)
        }
        return collectorError
    }

    private normalizeError(error: unknown): CollectorError {
        if (error instanceof CollectorError) {
            return error
        }

        if (error instanceof Error) {
            return new CollectorError(
                ErrorCode.INTERNAL_ERROR,
                error.message,
                error,
                ErrorSeverity.MEDIUM
            )
        }

        return new CollectorError(
            ErrorCode.INTERNAL_ERROR,
            `Unknown error occurred: ${String(error)}`,
            undefined,
            ErrorSeverity.LOW
        )
    }

    private isCriticalError(error: CollectorError): boolean {
        return error.severity === ErrorSeverity.CRITICAL
    }
}
