/**
 * Path: src/storage/artifacts.ts
 * Read/write of the canonical daily CSV and JSON artifacts
 */
import { AverageRecord } from "../aggregation/types"
import { parseAverageRecords } from "../aggregation/MinuteAverager"
import { CollectorError, ErrorCode, ErrorSeverity } from "../errors/types"
import {
    CSV_CONTENT_TYPE,
    IBlobStore,
    JSON_CONTENT_TYPE,
    UploadOptions,
    attachment,
} from "./IBlobStore"
import { dailyCsvKey, dailyJsonKey, fileNameOf } from "./keys"

function csvUploadOptions(key: string): UploadOptions {
    return {
        contentType: CSV_CONTENT_TYPE,
        contentDisposition: attachment(fileNameOf(key)),
    }
}

export async function uploadDailyCsv(
    store: IBlobStore,
    exchange: string,
    asset: string,
    day: string,
    data: Buffer
): Promise<string> {
    const key = dailyCsvKey(exchange, asset, day)
    await store.upload(key, data, csvUploadOptions(key))
    return key
}

export async function uploadDailyCsvFile(
    store: IBlobStore,
    exchange: string,
    asset: string,
    day: string,
    localPath: string
): Promise<string> {
    const key = dailyCsvKey(exchange, asset, day)
    await store.uploadFile(key, localPath, csvUploadOptions(key))
    return key
}

export async function uploadDailyJson(
    store: IBlobStore,
    exchange: string,
    asset: string,
    day: string,
    records: AverageRecord[]
): Promise<string> {
    const key = dailyJsonKey(exchange, asset, day)
    await store.upload(key, Buffer.from(JSON.stringify(records), "utf8"), {
        contentType: JSON_CONTENT_TYPE,
        contentDisposition: attachment(fileNameOf(key)),
    })
    return key
}

/** Minute records already published for the day, or [] when none exist. */
export async function loadDailyJson(
    store: IBlobStore,
    exchange: string,
    asset: string,
    day: string
): Promise<AverageRecord[]> {
    const key = dailyJsonKey(exchange, asset, day)
    const data = await store.download(key)
    if (data === null) return []
    try {
        return parseAverageRecords(JSON.parse(data.toString("utf8")))
    } catch (error) {
        throw new CollectorError(
            ErrorCode.STORAGE_READ_FAILED,
            `Invalid JSON artifact ${key}`,
            error instanceof Error ? error : undefined,
            ErrorSeverity.MEDIUM
        )
    }
}
