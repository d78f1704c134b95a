/**
 * Path: src/errors/types.ts
 * Collector error types
 */

export enum ErrorCode {
    ADAPTER_REQUEST_FAILED = "ADAPTER_REQUEST_FAILED",
    ADAPTER_PARSE_ERROR = "ADAPTER_PARSE_ERROR",
    API_RATE_LIMIT = "API_RATE_LIMIT",
    STORAGE_READ_FAILED = "STORAGE_READ_FAILED",
    STORAGE_WRITE_FAILED = "STORAGE_WRITE_FAILED",
    CONFIG_INVALID = "CONFIG_INVALID",
    UNSUPPORTED_EXCHANGE = "UNSUPPORTED_EXCHANGE",
    INTERNAL_ERROR = "INTERNAL_ERROR",
}

export enum ErrorSeverity {
    LOW = "LOW",
    MEDIUM = "MEDIUM",
    HIGH = "HIGH",
    CRITICAL = "CRITICAL",
}

export class CollectorError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly originalError?: Error,
        public readonly severity: ErrorSeverity = ErrorSeverity.MEDIUM
    ) {
        super(message)
        this.name = "CollectorError"
    }

    toString(): string {
        return `${this.name}[${this.code}]: ${this.message}`
    }
}
