import { describe, expect, it, vi } from "vitest"
import { ValidationError } from "../../../../shared/errors.js"
import { createContext, timeEntry } from "../../../__tests__/fakes.js"
import { listTimeEntries, listWeekEntries } from "../ListTimeEntries.js"

const now = new Date(2024, 0, 15, 12, 0, 0)

describe("listTimeEntries", () => {
  it("lists only the current user's entries for the period", async () => {
    const getEntries = vi.fn().mockResolvedValue([timeEntry(), timeEntry({ id: 12, users_id: 43 })])
    const context = createContext({ getEntries, getCurrentUserId: vi.fn().mockResolvedValue(42) }, { now })

    const result = await listTimeEntries({ period: "today" }, context)

    expect(getEntries).toHaveBeenCalledWith("2024-01-15T00:00:00Z", "2024-01-15T23:59:59Z")
    expect(result).toBe(
      [
        "📊 Time entries for today:",
        "",
        "• 01/15 09:00-17:30 Acme Corp - Website Relaunch (Development) [8.50h] (ID: 11)",
        "",
        "⏱️ Total: 8.50 hours"
      ].join("\n")
    )
  })

  it("says so when the period has no entries", async () => {
    const getCurrentUserId = vi.fn()
    const context = createContext({ getEntries: vi.fn().mockResolvedValue([]), getCurrentUserId }, { now })

    await expect(listTimeEntries({ period: "yesterday" }, context)).resolves.toBe(
      "No time entries found for yesterday"
    )
    expect(getCurrentUserId).not.toHaveBeenCalled()
  })

  it("distinguishes entries that belong to other users", async () => {
    const context = createContext(
      {
        getEntries: vi.fn().mockResolvedValue([timeEntry({ users_id: 43 })]),
        getCurrentUserId: vi.fn().mockResolvedValue(42)
      },
      { now }
    )

    await expect(listTimeEntries({ period: "month" }, context)).resolves.toBe(
      "No time entries found for your user for month"
    )
  })

  it("rejects an unknown period without calling the API", async () => {
    const getEntries = vi.fn()
    const context = createContext({ getEntries }, { now })

    await expect(listTimeEntries({ period: "quarter" }, context)).rejects.toThrow(
      new ValidationError("Invalid period 'quarter'. Use: today, yesterday, week, month")
    )
    expect(getEntries).not.toHaveBeenCalled()
  })
})

describe("listWeekEntries", () => {
  it("labels the listing with the week", async () => {
    const getWeekEntries = vi.fn().mockResolvedValue([timeEntry({ text: "Planning" })])
    const context = createContext({ getWeekEntries, getCurrentUserId: vi.fn().mockResolvedValue(42) })

    const result = await listWeekEntries({ year: 2024, week: 3 }, context)

    expect(getWeekEntries).toHaveBeenCalledWith(2024, 3)
    expect(result.split("\n")).toEqual([
      "📊 Time entries for week 3 of 2024:",
      "",
      "• 01/15 09:00-17:30 Acme Corp - Website Relaunch (Development) [8.50h] (ID: 11)",
      "  📝 Planning",
      "",
      "⏱️ Total: 8.50 hours"
    ])
  })
})
