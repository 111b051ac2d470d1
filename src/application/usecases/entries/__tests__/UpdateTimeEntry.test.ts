import { describe, expect, it, vi } from "vitest"
import { createContext, customers, projects, timeEntry } from "../../../__tests__/fakes.js"
import { updateTimeEntry } from "../UpdateTimeEntry.js"

describe("updateTimeEntry", () => {
  it("sends only the changed fields and echoes the entry", async () => {
    const updateEntry = vi.fn().mockResolvedValue(timeEntry({ text: "New text" }))
    const context = createContext({ updateEntry })

    const result = await updateTimeEntry({ entry_id: 11, description: "New text" }, context)

    expect(updateEntry).toHaveBeenCalledWith(11, { text: "New text" })
    expect(result).toBe(
      [
        "✅ Time entry 11 updated",
        "• 01/15 09:00-17:30 Acme Corp - Website Relaunch (Development) [8.50h] (ID: 11)",
        "  📝 New text"
      ].join("\n")
    )
  })

  it("moves an entry to another customer's project", async () => {
    const updateEntry = vi.fn().mockResolvedValue(timeEntry({ projects_id: 22, projects_name: "Support" }))
    const context = createContext({
      getCustomers: vi.fn().mockResolvedValue(customers),
      getProjects: vi.fn().mockResolvedValue(projects),
      updateEntry
    })

    await updateTimeEntry({ entry_id: 11, customer_name: "acme", project_name: "support" }, context)

    expect(updateEntry).toHaveBeenCalledWith(11, { customers_id: 7, projects_id: 22 })
  })

  it("previews a dry run without writing", async () => {
    const updateEntry = vi.fn()
    const context = createContext({ updateEntry })

    const result = await updateTimeEntry(
      { entry_id: 11, date: "2024-01-15", start_time: "08:00", end_time: "12:00", billable: false, dryRun: true },
      context
    )

    expect(result).toBe("🔍 Dry run: would update time entry 11 (time_since, time_until, billable)")
    expect(updateEntry).not.toHaveBeenCalled()
  })

  it("requires a date for new times", async () => {
    const context = createContext({})

    await expect(updateTimeEntry({ entry_id: 11, start_time: "08:00" }, context)).rejects.toThrow(
      "date is required when changing start_time or end_time"
    )
  })

  it("requires the customer when changing the project", async () => {
    const context = createContext({})

    await expect(updateTimeEntry({ entry_id: 11, project_name: "Support" }, context)).rejects.toThrow(
      "customer_name is required to change project_name"
    )
  })

  it("rejects an update that changes nothing", async () => {
    const context = createContext({})

    await expect(updateTimeEntry({ entry_id: 11, confirm: "yes" }, context)).rejects.toThrow(
      "Nothing to update. Provide at least one field to change."
    )
  })
})
