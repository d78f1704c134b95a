/**
 * Path: src/utils/common.ts
 * UTC time helpers shared by the logger, averager and composer
 */

export const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export function toUtcDate(timestamp: string | Date): Date | null {
    const date = timestamp instanceof Date ? timestamp : new Date(timestamp)
    return Number.isNaN(date.getTime()) ? null : date
}

/**
 * '2025-08-28T14:03:07.250Z' -> '2025-08-28T14:03:00Z'.
 * Returns null when the timestamp cannot be parsed.
 */
export function minuteBucket(timestamp: string | Date): string | null {
    const date = toUtcDate(timestamp)
    if (!date) return null
    return `${date.toISOString().slice(0, 16)}:00Z`
}

export function utcDay(date: Date): string {
    return date.toISOString().slice(0, 10)
}

export function previousUtcDay(date: Date): string {
    return utcDay(new Date(date.getTime() - 24 * 60 * 60 * 1000))
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}
