/**
 * Path: tests/composer/cli.test.ts
 */

import { CommanderError } from "commander"
import { buildProgram } from "../../src/composer"

describe("composer CLI", () => {
    const quietProgram = () => {
        const program = buildProgram()
        for (const command of [program, ...program.commands]) {
            command.exitOverride().configureOutput({ writeErr: () => undefined, writeOut: () => undefined })
        }
        return program
    }

    it("offers compose and schedule", () => {
        expect(quietProgram().commands.map((command) => command.name())).toEqual(["compose", "schedule"])
    })

    it("rejects a malformed day before touching storage", async () => {
        let caught: unknown
        try {
            await quietProgram().parseAsync(["compose", "--day", "2025-8-1"], { from: "user" })
        } catch (error) {
            caught = error
        }

        expect(caught).toBeInstanceOf(CommanderError)
        expect(caught).toMatchObject({ code: "commander.invalidArgument" })
    })
})
