import type { z } from "zod"
import type { UpdateTimeEntryInput } from "../../../mcp/schemas/entries.js"
import type { EntryUpdate } from "../../../infrastructure/clockodo/records.js"
import type { ToolContext } from "../../context.js"
import { ValidationError } from "../../../shared/errors.js"
import { formatDateTime } from "../../../shared/time.js"
import { resolveCustomer, resolveProject, resolveService } from "../../services/NameResolver.js"
import { formatEntryLines, formatNotFound } from "../../presentation/formatters.js"
import { parseEntryWindow, parseLocalDateTime } from "./entryTimes.js"

type Input = z.infer<typeof UpdateTimeEntryInput>

function collectTimes(input: Input, fields: EntryUpdate) {
  const hasTime = input.start_time !== undefined || input.end_time !== undefined
  if (!hasTime) {
    if (input.date !== undefined) {
      throw new ValidationError("Provide start_time and/or end_time together with date", { field: "date" })
    }
    return
  }
  if (input.date === undefined) {
    throw new ValidationError("date is required when changing start_time or end_time", { field: "date" })
  }
  if (input.start_time !== undefined && input.end_time !== undefined) {
    const window = parseEntryWindow(input.date, input.start_time, input.end_time)
    fields.time_since = formatDateTime(window.since)
    fields.time_until = formatDateTime(window.until)
    return
  }
  if (input.start_time !== undefined) {
    fields.time_since = formatDateTime(parseLocalDateTime(input.date, input.start_time, "start_time"))
  }
  if (input.end_time !== undefined) {
    fields.time_until = formatDateTime(parseLocalDateTime(input.date, input.end_time, "end_time"))
  }
}

export async function updateTimeEntry(input: Input, context: ToolContext): Promise<string> {
  const { client } = context
  const fields: EntryUpdate = {}

  collectTimes(input, fields)
  if (input.project_name !== undefined && input.customer_name === undefined) {
    throw new ValidationError("customer_name is required to change project_name", { field: "project_name" })
  }
  if (input.description !== undefined) fields.text = input.description
  if (input.billable !== undefined) fields.billable = input.billable

  if (input.customer_name !== undefined) {
    const customerMatch = await resolveCustomer(client, input.customer_name)
    if (!customerMatch.found) {
      return formatNotFound("customer", customerMatch)
    }
    fields.customers_id = customerMatch.item.id
    if (input.project_name !== undefined) {
      const projectMatch = await resolveProject(client, customerMatch.item, input.project_name)
      if (!projectMatch.found) {
        return formatNotFound("project", projectMatch, customerMatch.item.name)
      }
      fields.projects_id = projectMatch.item.id
    }
  }

  if (input.service_name !== undefined) {
    const serviceMatch = await resolveService(client, input.service_name)
    if (!serviceMatch.found) {
      return formatNotFound("service", serviceMatch)
    }
    fields.services_id = serviceMatch.item.id
  }

  const changed = Object.keys(fields)
  if (changed.length === 0) {
    throw new ValidationError("Nothing to update. Provide at least one field to change.")
  }

  if (input.dryRun) {
    return `🔍 Dry run: would update time entry ${input.entry_id} (${changed.join(", ")})`
  }

  const entry = await client.updateEntry(input.entry_id, fields)
  return [`✅ Time entry ${input.entry_id} updated`, ...formatEntryLines(entry)].join("\n")
}
