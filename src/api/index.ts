/**
 * Path: src/api/index.ts
 * File API process
 */
import { YamlConfigLoader } from "../config/YamlConfigLoader"
import { GcsBlobStore } from "../storage/gcs/GcsBlobStore"
import { Logger } from "../utils/logger"
import { FileServer } from "./FileServer"

const logger = Logger.getInstance("FileApi")

async function main(): Promise<void> {
    const config = new YamlConfigLoader().loadConfig()
    const store = new GcsBlobStore({ bucket: config.bucket, makePublic: false })
    const server = new FileServer(store, config.api)
    await server.listen()

    const close = () => {
        server
            .close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error("Failed to close file API", error)
                process.exit(1)
            })
    }
    process.on("SIGINT", close)
    process.on("SIGTERM", close)
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error("File API failed to start", error)
        process.exit(1)
    })
}
