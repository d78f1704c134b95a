/**
 * Path: src/storage/keys.ts
 * Blob key layout and local file paths
 */
import path from "path"
import { DAY_PATTERN } from "../utils/common"

// coinbase/ADA/ADA-2025-08-28.csv
export function dailyCsvKey(exchange: string, asset: string, day: string): string {
    return `${exchange}/${asset}/${asset}-${day}.csv`
}

// coinbase/ADA/ADA-2025-08-28.json
export function dailyJsonKey(exchange: string, asset: string, day: string): string {
    return `${exchange}/${asset}/${asset}-${day}.json`
}

export function assetPrefix(exchange: string, asset: string): string {
    return `${exchange}/${asset}/`
}

export interface ShardKey {
    key: string
    hour: string
}

const SHARD_PATTERNS = (day: string): RegExp[] => [
    new RegExp(`^${day}_(\\d{2})\\.csv$`), // 2025-08-28_08.csv
    new RegExp(`^${day}/seconds_H(\\d{2})\\.csv$`), // 2025-08-28/seconds_H08.csv
]

/** Shard keys of one day among `keys`, ordered by hour. */
export function matchShardKeys(
    keys: string[],
    exchange: string,
    asset: string,
    day: string
): ShardKey[] {
    const prefix = assetPrefix(exchange, asset)
    const shards: ShardKey[] = []
    for (const key of keys) {
        if (!key.startsWith(prefix)) continue
        const rest = key.slice(prefix.length)
        for (const pattern of SHARD_PATTERNS(day)) {
            const match = pattern.exec(rest)
            if (match) {
                shards.push({ key, hour: match[1] })
                break
            }
        }
    }
    return shards.sort((a, b) => a.hour.localeCompare(b.hour) || a.key.localeCompare(b.key))
}

// data/coinbase/ADA-2025-08-28_coinbase.csv (local only)
export function localDailyCsvPath(
    baseDir: string,
    exchange: string,
    asset: string,
    day: string
): string {
    return path.join(baseDir, exchange, `${asset}-${day}_${exchange}.csv`)
}

/** 'ADA-2025-08-28.json' -> '2025-08-28' */
export function dayFromDailyKey(key: string, asset: string, extension: string): string | null {
    const fileName = key.slice(key.lastIndexOf("/") + 1)
    const prefix = `${asset}-`
    const suffix = `.${extension}`
    if (!fileName.startsWith(prefix) || !fileName.endsWith(suffix)) return null
    const day = fileName.slice(prefix.length, fileName.length - suffix.length)
    return DAY_PATTERN.test(day) ? day : null
}

export function fileNameOf(key: string): string {
    return key.slice(key.lastIndexOf("/") + 1)
}
