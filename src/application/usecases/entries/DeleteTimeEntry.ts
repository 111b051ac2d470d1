import type { z } from "zod"
import type { DeleteTimeEntryInput } from "../../../mcp/schemas/entries.js"
import type { ToolContext } from "../../context.js"
import { describeError } from "../../presentation/formatters.js"

type Input = z.infer<typeof DeleteTimeEntryInput>

export async function deleteTimeEntry(input: Input, context: ToolContext): Promise<string> {
  if (input.dryRun) {
    return `🔍 Dry run: would delete time entry ${input.entry_id}`
  }

  const outcome = await context.client.deleteEntry(input.entry_id)
  if (outcome.deleted) {
    return `🗑️ Time entry ${outcome.entryId} deleted`
  }
  return `❌ Could not delete time entry ${outcome.entryId}: ${describeError(outcome.error)}`
}
