/**
 * Path: src/collectors/types.ts
 */
import { ExchangeConfig } from "../config/types"

export interface CollectorPair {
    id: string // series key, exchange:asset
    exchange: ExchangeConfig
    asset: string
}

export interface CycleResult {
    day: string
    recorded: number // rows written this cycle
    skipped: number // empty books or pairs not yet prepared
    failed: number // adapter errors
    uploaded: boolean
}
