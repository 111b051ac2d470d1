import type { z } from "zod"
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { ToolAnnotations } from "@modelcontextprotocol/sdk/types.js"
import type { ToolContext } from "../application/context.js"
import { mutatingAnnotation, readOnlyAnnotation } from "./annotations.js"
import { parseInput, runHandler } from "./boundary.js"
import {
  CreateTimeEntryInput,
  DeleteTimeEntryInput,
  GetRunningEntryInput,
  HealthInput,
  ListTimeEntriesInput,
  ListWeekEntriesInput,
  StartTimeTrackingInput,
  StopTimeTrackingInput,
  UpdateTimeEntryInput,
  WorkSummaryInput
} from "./schemas/index.js"
import { withSafetyConfirmation } from "../application/safety/withSafetyConfirmation.js"
import { startTimeTracking } from "../application/usecases/clock/StartTimeTracking.js"
import { stopTimeTracking } from "../application/usecases/clock/StopTimeTracking.js"
import { getRunningEntry } from "../application/usecases/clock/GetRunningEntry.js"
import { createTimeEntry } from "../application/usecases/entries/CreateTimeEntry.js"
import { updateTimeEntry } from "../application/usecases/entries/UpdateTimeEntry.js"
import { deleteTimeEntry } from "../application/usecases/entries/DeleteTimeEntry.js"
import { listTimeEntries, listWeekEntries } from "../application/usecases/entries/ListTimeEntries.js"
import { getWorkSummary } from "../application/usecases/entries/WorkSummary.js"
import { health } from "../application/usecases/system/Health.js"

export type ToolDefinition = {
  name: string
  description: string
  schema: z.AnyZodObject
  annotations: ToolAnnotations
  mutating: boolean
  run: (rawInput: unknown) => Promise<string>
}

type ToolOptions<S extends z.AnyZodObject> = {
  name: string
  description: string
  schema: S
  action: string
  annotations: ToolAnnotations
  mutating?: boolean
  handler: (input: z.output<S>) => Promise<string>
}

function defineTool<S extends z.AnyZodObject>(options: ToolOptions<S>): ToolDefinition {
  return {
    name: options.name,
    description: options.description,
    schema: options.schema,
    annotations: options.annotations,
    mutating: options.mutating ?? false,
    run: (rawInput) => runHandler(options.action, () => options.handler(parseInput(options.schema, rawInput)))
  }
}

export function createToolDefinitions(context: ToolContext): ToolDefinition[] {
  return [
    defineTool({
      name: "start_time_tracking",
      description:
        "Start the clock for a customer, optionally on a project and service. Names are matched case-insensitively by substring.",
      schema: StartTimeTrackingInput,
      action: "starting time tracking",
      annotations: mutatingAnnotation("Start time tracking"),
      mutating: true,
      handler: (input) => startTimeTracking(input, context)
    }),
    defineTool({
      name: "stop_time_tracking",
      description: "Stop the running clock and report how long it ran.",
      schema: StopTimeTrackingInput,
      action: "stopping time tracking",
      annotations: mutatingAnnotation("Stop time tracking"),
      mutating: true,
      handler: () => stopTimeTracking(context)
    }),
    defineTool({
      name: "get_running_entry",
      description: "Show the entry the clock is currently running on, if any.",
      schema: GetRunningEntryInput,
      action: "getting running entry",
      annotations: readOnlyAnnotation("Running entry"),
      handler: () => getRunningEntry(context)
    }),
    defineTool({
      name: "create_time_entry",
      description: "Book a finished time entry for a customer on a given date between two local times.",
      schema: CreateTimeEntryInput,
      action: "creating time entry",
      annotations: mutatingAnnotation("Create time entry"),
      mutating: true,
      handler: (input) => createTimeEntry(input, context)
    }),
    defineTool({
      name: "update_time_entry",
      description:
        'Change fields of an existing time entry by ID. Requires confirm: "yes"; dryRun: true previews the change.',
      schema: UpdateTimeEntryInput,
      action: "updating time entry",
      annotations: mutatingAnnotation("Update time entry", { idempotent: true }),
      mutating: true,
      handler: withSafetyConfirmation((input: z.output<typeof UpdateTimeEntryInput>) =>
        updateTimeEntry(input, context)
      )
    }),
    defineTool({
      name: "delete_time_entry",
      description: 'Delete a time entry by ID. Requires confirm: "yes"; dryRun: true previews the deletion.',
      schema: DeleteTimeEntryInput,
      action: "deleting time entry",
      annotations: mutatingAnnotation("Delete time entry", { destructive: true, idempotent: true }),
      mutating: true,
      handler: withSafetyConfirmation((input: z.output<typeof DeleteTimeEntryInput>) =>
        deleteTimeEntry(input, context)
      )
    }),
    defineTool({
      name: "list_time_entries",
      description: "List your time entries for today, yesterday, this week or this month.",
      schema: ListTimeEntriesInput,
      action: "getting time entries",
      annotations: readOnlyAnnotation("List time entries"),
      handler: (input) => listTimeEntries(input, context)
    }),
    defineTool({
      name: "list_week_entries",
      description: "List your time entries for a calendar week of a year.",
      schema: ListWeekEntriesInput,
      action: "getting week entries",
      annotations: readOnlyAnnotation("List week entries"),
      handler: (input) => listWeekEntries(input, context)
    }),
    defineTool({
      name: "get_work_summary",
      description: "Summarise your hours per customer and project for a period.",
      schema: WorkSummaryInput,
      action: "getting work summary",
      annotations: readOnlyAnnotation("Work summary"),
      handler: (input) => getWorkSummary(input, context)
    }),
    defineTool({
      name: "health",
      description: "Report server readiness and mode.",
      schema: HealthInput,
      action: "checking health",
      annotations: { ...readOnlyAnnotation("Health"), openWorldHint: false },
      handler: () => health(context)
    })
  ]
}

/** Registers every tool on `server`; mutating tools are left out in read-only mode. */
export function registerTools(server: McpServer, context: ToolContext) {
  const registered: string[] = []
  for (const tool of createToolDefinitions(context)) {
    if (tool.mutating && context.config.readOnly) {
      continue
    }
    server.registerTool<z.ZodRawShape, z.ZodRawShape>(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.schema.shape,
        annotations: tool.annotations
      },
      async (args) => ({
        content: [{ type: "text" as const, text: await tool.run(args) }]
      })
    )
    registered.push(tool.name)
  }
  return registered
}
