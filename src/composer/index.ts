/**
 * Path: src/composer/index.ts
 * Daily composer CLI
 *   compose [--day YYYY-MM-DD]   compose one day (default: yesterday UTC) and exit
 *   schedule                     compose yesterday every day at 00:03 UTC
 */
import { Command, InvalidArgumentError } from "commander"
import { YamlConfigLoader } from "../config/YamlConfigLoader"
import { GcsBlobStore } from "../storage/gcs/GcsBlobStore"
import { DAY_PATTERN, previousUtcDay } from "../utils/common"
import { Logger } from "../utils/logger"
import { DailyComposer } from "./DailyComposer"

const logger = Logger.getInstance("Composer")

function parseDay(value: string): string {
    if (!DAY_PATTERN.test(value)) {
        throw new InvalidArgumentError("expected YYYY-MM-DD")
    }
    return value
}

function createComposer(configPath?: string): DailyComposer {
    const config = new YamlConfigLoader(configPath).loadConfig()
    const store = new GcsBlobStore({ bucket: config.bucket, makePublic: config.makePublic })
    return new DailyComposer(store, config.exchanges, config.assets)
}

export function buildProgram(): Command {
    const program = new Command()
    program
        .name("composer")
        .description("Merge shard CSVs into the canonical daily CSV and JSON")
        .option("-c, --config <path>", "config file (defaults to CONFIG_PATH or config.yaml)")

    program
        .command("compose")
        .description("compose one day and exit")
        .option("-d, --day <day>", "UTC day, YYYY-MM-DD", parseDay)
        .action(async (options: { day?: string }) => {
            const day = options.day ?? previousUtcDay(new Date())
            const summary = await createComposer(program.opts<{ config?: string }>().config).composeAll(day)
            logger.info("Composition finished", { ...summary })
            if (summary.failed.length > 0) {
                process.exitCode = 1
            }
        })

    program
        .command("schedule")
        .description("compose the previous day every day at 00:03 UTC")
        .action(() => {
            createComposer(program.opts<{ config?: string }>().config).scheduleDaily()
        })

    return program
}

if (require.main === module) {
    buildProgram()
        .parseAsync(process.argv)
        .catch((error: unknown) => {
            logger.error("Composer failed", error)
            process.exit(1)
        })
}
