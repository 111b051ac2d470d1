import { describe, expect, it, vi } from "vitest"
import { ClockodoRequestError } from "../../../../infrastructure/clockodo/ClockodoClient.js"
import { createContext, customers, projects, services, timeEntry } from "../../../__tests__/fakes.js"
import { startTimeTracking } from "../StartTimeTracking.js"
import { stopTimeTracking } from "../StopTimeTracking.js"
import { getRunningEntry } from "../GetRunningEntry.js"

describe("startTimeTracking", () => {
  it("resolves names and starts the clock", async () => {
    const startClock = vi.fn().mockResolvedValue(timeEntry({ time_until: undefined }))
    const getProjects = vi.fn().mockResolvedValue(projects)
    const context = createContext({
      getCustomers: vi.fn().mockResolvedValue(customers),
      getProjects,
      getServices: vi.fn().mockResolvedValue(services),
      startClock
    })

    const result = await startTimeTracking(
      { customer_name: "acme", project_name: "web", service_name: "DEV", description: "Bugfix", billable: true },
      context
    )

    expect(result).toBe("✅ Time tracking started for Acme Corp - Website Relaunch (Development)")
    expect(getProjects).toHaveBeenCalledWith(7)
    expect(startClock).toHaveBeenCalledWith({
      customersId: 7,
      projectsId: 21,
      servicesId: 3,
      billable: true,
      text: "Bugfix"
    })
  })

  it("starts on the customer alone when no project or service is named", async () => {
    const startClock = vi.fn().mockResolvedValue(undefined)
    const context = createContext({ getCustomers: vi.fn().mockResolvedValue(customers), startClock })

    const result = await startTimeTracking({ customer_name: "Globex", billable: false }, context)

    expect(result).toBe("✅ Time tracking started for Globex")
    expect(startClock).toHaveBeenCalledWith({
      customersId: 8,
      projectsId: undefined,
      servicesId: undefined,
      billable: false,
      text: undefined
    })
  })

  it("reports an unknown customer without starting the clock", async () => {
    const startClock = vi.fn()
    const context = createContext({ getCustomers: vi.fn().mockResolvedValue(customers), startClock })

    const result = await startTimeTracking({ customer_name: "Initech", billable: true }, context)

    expect(result).toBe("Customer 'Initech' not found. Available customers: Acme Corp, Globex")
    expect(startClock).not.toHaveBeenCalled()
  })

  it("reports a project that the customer does not have", async () => {
    const context = createContext({
      getCustomers: vi.fn().mockResolvedValue(customers),
      getProjects: vi.fn().mockResolvedValue(projects)
    })

    const result = await startTimeTracking({ customer_name: "Acme", project_name: "Mobile", billable: true }, context)

    expect(result).toBe(
      "Project 'Mobile' not found for customer 'Acme Corp'. Available projects: Website Relaunch, Support"
    )
  })
})

describe("stopTimeTracking", () => {
  it("does nothing when no clock is running", async () => {
    const stopClock = vi.fn()
    const context = createContext({ getClock: vi.fn().mockResolvedValue({ running: false }), stopClock })

    await expect(stopTimeTracking(context)).resolves.toBe("⏹️ No time tracking currently running")
    expect(stopClock).not.toHaveBeenCalled()
  })

  it("stops the clock and reports the elapsed hours", async () => {
    const stopClock = vi.fn().mockResolvedValue(undefined)
    const context = createContext(
      {
        getClock: vi.fn().mockResolvedValue({ running: true, entry: timeEntry({ time_until: undefined }) }),
        stopClock
      },
      { now: new Date("2024-01-15T12:00:00Z") }
    )

    await expect(stopTimeTracking(context)).resolves.toBe("⏹️ Time tracking stopped. Duration: 3.00 hours")
    expect(stopClock).toHaveBeenCalledTimes(1)
  })

  it("omits the duration when the start time cannot be read", async () => {
    const context = createContext({
      getClock: vi.fn().mockResolvedValue({
        running: true,
        entry: timeEntry({ time_since: "yesterday", time_until: undefined })
      }),
      stopClock: vi.fn().mockResolvedValue(undefined)
    })

    await expect(stopTimeTracking(context)).resolves.toBe("⏹️ Time tracking stopped")
  })

  it("surfaces a failed clock lookup instead of reporting an idle clock", async () => {
    const failure = new ClockodoRequestError({
      statusCode: 401,
      message: "Invalid credentials",
      upstream: { method: "GET", path: "clock" }
    })
    const context = createContext({ getClock: vi.fn().mockResolvedValue({ running: false, error: failure }) })

    await expect(stopTimeTracking(context)).rejects.toBe(failure)
  })
})

describe("getRunningEntry", () => {
  it("describes the running entry", async () => {
    const context = createContext(
      {
        getClock: vi.fn().mockResolvedValue({
          running: true,
          entry: timeEntry({ time_until: undefined, text: "Bugfix" })
        })
      },
      { now: new Date("2024-01-15T10:30:00Z") }
    )

    await expect(getRunningEntry(context)).resolves.toBe(
      [
        "⏰ Currently tracking: Acme Corp - Website Relaunch (Development)",
        "Description: Bugfix",
        "Duration: 1.50 hours (started 09:00)"
      ].join("\n")
    )
  })

  it("reports an idle clock", async () => {
    const context = createContext({ getClock: vi.fn().mockResolvedValue({ running: false }) })

    await expect(getRunningEntry(context)).resolves.toBe("⏹️ No time tracking currently running")
  })
})
