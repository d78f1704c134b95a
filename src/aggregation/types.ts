/**
 * Path: src/aggregation/types.ts
 */

/** One per-second sample fed into the minute averager. */
export interface MinuteTick {
    exchange: string
    asset: string
    timestamp: string | Date
    price: number | null
    spreadRaw: number | null
    spreadPct5: number | null
    spreadPct20: number | null
    spreadPct50: number | null
    spreadPct100: number | null
    spreadPct5000?: number | null
    bidVolume50: number | null
    askVolume50: number | null
}

/** One completed minute, as stored in the daily JSON artifact. */
export interface AverageRecord {
    t: string
    exchange: string
    asset: string
    price_avg: number
    spread_raw_avg: number
    spread_L5_pct_avg: number
    spread_L20_pct_avg: number
    spread_L50_pct_avg: number
    spread_L100_pct_avg: number
    spread_L5000_pct_avg?: number
    bid_volume_L50_avg: number
    ask_volume_L50_avg: number
}

export interface PendingMinute {
    bucket: string
    exchange: string
    asset: string
    n: number
}
