/**
 * Path: src/storage/IBlobStore.ts
 */

export interface UploadOptions {
    contentType: string
    contentDisposition?: string
    cacheControl?: string
}

export interface IBlobStore {
    exists(key: string): Promise<boolean>
    /** Resolves null when the key does not exist. */
    download(key: string): Promise<Buffer | null>
    /** Writes a temporary object first so readers never see a half-written file. */
    upload(key: string, data: Buffer, options: UploadOptions): Promise<void>
    uploadFile(key: string, localPath: string, options: UploadOptions): Promise<void>
    list(prefix?: string): Promise<string[]>
}

export const DEFAULT_CACHE_CONTROL = "public, max-age=60"
export const CSV_CONTENT_TYPE = "text/csv; charset=utf-8"
export const JSON_CONTENT_TYPE = "application/json; charset=utf-8"

export function attachment(fileName: string): string {
    return `attachment; filename="${fileName}"`
}
