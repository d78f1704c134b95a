/**
 * Path: tests/utils/common.test.ts
 */

import { minuteBucket, previousUtcDay, toUtcDate, utcDay } from "../../src/utils/common"

describe("minuteBucket", () => {
    it("zeroes seconds and fractions", () => {
        expect(minuteBucket("2025-08-28T14:03:07.250Z")).toBe("2025-08-28T14:03:00Z")
        expect(minuteBucket(new Date(Date.UTC(2025, 7, 28, 14, 3, 59, 999)))).toBe(
            "2025-08-28T14:03:00Z"
        )
    })

    it("buckets in UTC regardless of the offset given", () => {
        expect(minuteBucket("2025-08-28T16:03:07+02:00")).toBe("2025-08-28T14:03:00Z")
    })

    it("is null for an unparseable timestamp", () => {
        expect(minuteBucket("yesterday-ish")).toBeNull()
        expect(toUtcDate("")).toBeNull()
    })
})

describe("utc days", () => {
    it("formats the UTC calendar day", () => {
        expect(utcDay(new Date("2025-08-28T23:59:59Z"))).toBe("2025-08-28")
    })

    it("returns the day before", () => {
        expect(previousUtcDay(new Date("2025-03-01T00:03:00Z"))).toBe("2025-02-28")
    })
})
