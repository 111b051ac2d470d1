import type { ToolContext } from "../../context.js"
import { formatRunningEntry } from "../../presentation/formatters.js"
import { NOTHING_RUNNING } from "./StopTimeTracking.js"

export async function getRunningEntry(context: ToolContext): Promise<string> {
  const state = await context.client.getClock()
  if (!state.running) {
    // A failed lookup is reported as such rather than as an idle clock.
    if (state.error) {
      throw state.error
    }
    return NOTHING_RUNNING
  }
  return formatRunningEntry(state.entry, context.now())
}
