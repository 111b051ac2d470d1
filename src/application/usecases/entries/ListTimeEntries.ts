import type { z } from "zod"
import type { ListTimeEntriesInput, ListWeekEntriesInput } from "../../../mcp/schemas/entries.js"
import type { ClockodoClient } from "../../../infrastructure/clockodo/ClockodoClient.js"
import type { TimeEntry } from "../../../infrastructure/clockodo/records.js"
import type { ToolContext } from "../../context.js"
import { resolvePeriod } from "../../services/PeriodCalculator.js"
import { formatEntries } from "../../presentation/formatters.js"

type PeriodInput = z.infer<typeof ListTimeEntriesInput>
type WeekInput = z.infer<typeof ListWeekEntriesInput>

export type OwnEntries =
  | { status: "none" }
  | { status: "none_for_user" }
  | { status: "found"; entries: TimeEntry[] }

/** Narrows an account-wide listing to entries booked by the authenticated user. */
export async function selectOwnEntries(client: ClockodoClient, entries: TimeEntry[]): Promise<OwnEntries> {
  if (entries.length === 0) {
    return { status: "none" }
  }
  const userId = await client.getCurrentUserId()
  const own = entries.filter((entry) => entry.users_id === userId)
  return own.length === 0 ? { status: "none_for_user" } : { status: "found", entries: own }
}

async function renderOwnEntries(client: ClockodoClient, label: string, entries: TimeEntry[]) {
  const selection = await selectOwnEntries(client, entries)
  switch (selection.status) {
    case "none":
      return `No time entries found for ${label}`
    case "none_for_user":
      return `No time entries found for your user for ${label}`
    case "found":
      return formatEntries(label, selection.entries)
  }
}

export async function listTimeEntries(input: PeriodInput, context: ToolContext): Promise<string> {
  const period = resolvePeriod(input.period, context.now())
  const entries = await context.client.getEntries(period.since, period.until)
  return renderOwnEntries(context.client, period.name, entries)
}

export async function listWeekEntries(input: WeekInput, context: ToolContext): Promise<string> {
  const entries = await context.client.getWeekEntries(input.year, input.week)
  return renderOwnEntries(context.client, `week ${input.week} of ${input.year}`, entries)
}
