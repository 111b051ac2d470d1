import type { z } from "zod"
import type { WorkSummaryInput } from "../../../mcp/schemas/entries.js"
import type { ToolContext } from "../../context.js"
import { resolvePeriod } from "../../services/PeriodCalculator.js"
import { formatSummary, summariseEntries } from "../../presentation/formatters.js"
import { selectOwnEntries } from "./ListTimeEntries.js"

type Input = z.infer<typeof WorkSummaryInput>

export async function getWorkSummary(input: Input, context: ToolContext): Promise<string> {
  const period = resolvePeriod(input.period, context.now())
  const entries = await context.client.getEntries(period.since, period.until)
  const selection = await selectOwnEntries(context.client, entries)
  if (selection.status === "none") {
    return `No time entries for ${period.name}`
  }
  if (selection.status === "none_for_user") {
    return `No time entries found for your user for ${period.name}`
  }
  return formatSummary(period.name, summariseEntries(selection.entries))
}
