/**
 * Path: src/storage/gcs/GcsBlobStore.ts
 * Google Cloud Storage implementation of IBlobStore
 */
import fs from "fs/promises"
import { Bucket, Storage } from "@google-cloud/storage"
import { CollectorError, ErrorCode, ErrorSeverity } from "../../errors/types"
import { Logger } from "../../utils/logger"
import { DEFAULT_CACHE_CONTROL, IBlobStore, UploadOptions } from "../IBlobStore"

export interface GcsBlobStoreOptions {
    bucket: string
    makePublic: boolean
}

export class GcsBlobStore implements IBlobStore {
    private readonly bucket: Bucket
    private readonly logger = Logger.getInstance("GcsBlobStore")

    constructor(
        private readonly options: GcsBlobStoreOptions,
        storage: Storage = new Storage()
    ) {
        this.bucket = storage.bucket(options.bucket)
    }

    async exists(key: string): Promise<boolean> {
        try {
            const [exists] = await this.bucket.file(key).exists()
            return exists
        } catch (error) {
            throw this.storageError(ErrorCode.STORAGE_READ_FAILED, `exists ${key}`, error)
        }
    }

    async download(key: string): Promise<Buffer | null> {
        if (!(await this.exists(key))) return null
        try {
            const [data] = await this.bucket.file(key).download()
            return data
        } catch (error) {
            throw this.storageError(ErrorCode.STORAGE_READ_FAILED, `download ${key}`, error)
        }
    }

    async upload(key: string, data: Buffer, options: UploadOptions): Promise<void> {
        const tmpKey = `${key}.tmp.${Date.now()}`
        const tmp = this.bucket.file(tmpKey)
        const target = this.bucket.file(key)
        try {
            await tmp.save(data, {
                resumable: false,
                contentType: options.contentType,
                metadata: {
                    cacheControl: options.cacheControl ?? DEFAULT_CACHE_CONTROL,
                    contentDisposition: options.contentDisposition,
                },
            })
            await tmp.copy(target)
            if (this.options.makePublic) {
                await target.makePublic()
            }
            this.logger.debug("Uploaded blob", { key, bytes: data.length })
        } catch (error) {
            throw this.storageError(ErrorCode.STORAGE_WRITE_FAILED, `upload ${key}`, error)
        } finally {
            await this.removeTemporary(tmpKey)
        }
    }

    // a leftover temp object would show up in listings
    private async removeTemporary(tmpKey: string): Promise<void> {
        try {
            await this.bucket.file(tmpKey).delete({ ignoreNotFound: true })
        } catch (error) {
            this.logger.warn("Temporary blob not removed", {
                key: tmpKey,
                error: error instanceof Error ? error.message : String(error),
            })
        }
    }

    async uploadFile(key: string, localPath: string, options: UploadOptions): Promise<void> {
        // snapshot of the file at call time
        const data = await fs.readFile(localPath)
        await this.upload(key, data, options)
    }

    async list(prefix?: string): Promise<string[]> {
        try {
            const [files] = await this.bucket.getFiles({ prefix })
            return files.map((file) => file.name)
        } catch (error) {
            throw this.storageError(ErrorCode.STORAGE_READ_FAILED, `list ${prefix ?? ""}`, error)
        }
    }

    private storageError(code: ErrorCode, operation: string, error: unknown): CollectorError {
        return new CollectorError(
            code,
            `GCS ${operation} failed on bucket ${this.options.bucket}`,
            error instanceof Error ? error : undefined,
            ErrorSeverity.HIGH
        )
    }
}
