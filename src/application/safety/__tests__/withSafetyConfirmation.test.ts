import { describe, expect, it, vi } from "vitest"
import { CONFIRMATION_REQUIRED, withSafetyConfirmation } from "../withSafetyConfirmation.js"

type Input = { entry_id: number; confirm?: string; dryRun?: boolean }

describe("withSafetyConfirmation", () => {
  it("asks for confirmation before running", async () => {
    const handler = vi.fn(async (_input: Input) => "done")
    const guarded = withSafetyConfirmation(handler)

    await expect(guarded({ entry_id: 1 })).resolves.toBe(CONFIRMATION_REQUIRED)
    await expect(guarded({ entry_id: 1, confirm: "no" })).resolves.toBe(CONFIRMATION_REQUIRED)
    expect(handler).not.toHaveBeenCalled()
  })

  it("runs confirmed input as a real change", async () => {
    const handler = vi.fn(async (_input: Input) => "done")
    const guarded = withSafetyConfirmation(handler)

    await expect(guarded({ entry_id: 1, confirm: " YES " })).resolves.toBe("done")
    expect(handler).toHaveBeenCalledWith({ entry_id: 1, confirm: " YES ", dryRun: false })
  })

  it("runs a dry run without confirmation", async () => {
    const handler = vi.fn(async (_input: Input) => "preview")
    const guarded = withSafetyConfirmation(handler)

    await expect(guarded({ entry_id: 1, dryRun: true })).resolves.toBe("preview")
    expect(handler).toHaveBeenCalledWith({ entry_id: 1, dryRun: true })
  })
})
