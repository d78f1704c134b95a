/**
 * Path: tests/storage/gcs/GcsBlobStore.test.ts
 * File methods are stubbed; nothing reaches the network
 */

import { File, Storage } from "@google-cloud/storage"
import { ErrorCode } from "../../../src/errors/types"
import { GcsBlobStore } from "../../../src/storage/gcs/GcsBlobStore"

const OPTIONS = { contentType: "text/csv; charset=utf-8" }

const stubFiles = () => ({
    save: jest.spyOn(File.prototype, "save").mockImplementation(() => Promise.resolve()),
    copy: jest.spyOn(File.prototype, "copy").mockImplementation(() => Promise.resolve()),
    remove: jest.spyOn(File.prototype, "delete").mockImplementation(() => Promise.resolve()),
    makePublic: jest.spyOn(File.prototype, "makePublic").mockImplementation(() => Promise.resolve()),
})

describe("GcsBlobStore.upload", () => {
    const createStore = (makePublic: boolean) =>
        new GcsBlobStore({ bucket: "test-bucket", makePublic }, new Storage({ projectId: "test-project" }))

    afterEach(() => {
        jest.restoreAllMocks()
    })

    it("writes a temporary object, copies it and removes it", async () => {
        const files = stubFiles()

        await createStore(true).upload("coinbase/ADA/ADA-2025-08-28.csv", Buffer.from("a\n"), OPTIONS)

        expect(files.save).toHaveBeenCalledTimes(1)
        expect(files.copy).toHaveBeenCalledTimes(1)
        expect(files.makePublic).toHaveBeenCalledTimes(1)
        expect(files.remove).toHaveBeenCalledTimes(1)
        expect(files.remove).toHaveBeenCalledWith({ ignoreNotFound: true })
    })

    it("removes the temporary object when the copy fails", async () => {
        const files = stubFiles()
        files.copy.mockImplementation(() => Promise.reject(new Error("copy denied")))

        await expect(
            createStore(true).upload("coinbase/ADA/ADA-2025-08-28.csv", Buffer.from("a\n"), OPTIONS)
        ).rejects.toMatchObject({ code: ErrorCode.STORAGE_WRITE_FAILED })

        expect(files.makePublic).not.toHaveBeenCalled()
        expect(files.remove).toHaveBeenCalledTimes(1)
        expect(files.remove).toHaveBeenCalledWith({ ignoreNotFound: true })
    })

    it("removes the temporary object when publishing fails", async () => {
        const files = stubFiles()
        files.makePublic.mockImplementation(() => Promise.reject(new Error("acl denied")))

        await expect(
            createStore(true).upload("coinbase/ADA/ADA-2025-08-28.json", Buffer.from("[]"), OPTIONS)
        ).rejects.toMatchObject({ code: ErrorCode.STORAGE_WRITE_FAILED })

        expect(files.remove).toHaveBeenCalledTimes(1)
    })

    it("still succeeds when the cleanup itself fails", async () => {
        const files = stubFiles()
        files.remove.mockImplementation(() => Promise.reject(new Error("delete denied")))

        await expect(
            createStore(false).upload("coinbase/ADA/ADA-2025-08-28.csv", Buffer.from("a\n"), OPTIONS)
        ).resolves.toBeUndefined()

        expect(files.makePublic).not.toHaveBeenCalled()
    })
})
