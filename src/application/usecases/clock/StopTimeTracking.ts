import type { ToolContext } from "../../context.js"
import { elapsedHours, formatHours } from "../../../shared/time.js"

export const NOTHING_RUNNING = "⏹️ No time tracking currently running"

export async function stopTimeTracking(context: ToolContext): Promise<string> {
  const { client } = context
  const state = await client.getClock()
  if (!state.running) {
    if (state.error) {
      throw state.error
    }
    return NOTHING_RUNNING
  }

  await client.stopClock()

  const hours = elapsedHours(state.entry.time_since, context.now())
  if (hours === undefined) {
    return "⏹️ Time tracking stopped"
  }
  return `⏹️ Time tracking stopped. Duration: ${formatHours(hours)} hours`
}
