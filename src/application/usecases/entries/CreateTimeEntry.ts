import type { z } from "zod"
import type { CreateTimeEntryInput } from "../../../mcp/schemas/entries.js"
import type { ToolContext } from "../../context.js"
import { resolveCustomer, resolveProject, resolveService } from "../../services/NameResolver.js"
import { formatNotFound } from "../../presentation/formatters.js"
import { formatDateTime, formatHours } from "../../../shared/time.js"
import { parseEntryWindow } from "./entryTimes.js"

type Input = z.infer<typeof CreateTimeEntryInput>

export async function createTimeEntry(input: Input, context: ToolContext): Promise<string> {
  const { client } = context
  const window = parseEntryWindow(input.date, input.start_time, input.end_time)

  const customerMatch = await resolveCustomer(client, input.customer_name)
  if (!customerMatch.found) {
    return formatNotFound("customer", customerMatch)
  }
  const customer = customerMatch.item

  let projectsId: number | undefined
  if (input.project_name) {
    const match = await resolveProject(client, customer, input.project_name)
    if (!match.found) {
      return formatNotFound("project", match, customer.name)
    }
    projectsId = match.item.id
  }

  let servicesId: number | undefined
  if (input.service_name) {
    const match = await resolveService(client, input.service_name)
    if (!match.found) {
      return formatNotFound("service", match)
    }
    servicesId = match.item.id
  }

  const entry = await client.createEntry({
    customersId: customer.id,
    projectsId,
    servicesId,
    timeSince: formatDateTime(window.since),
    timeUntil: formatDateTime(window.until),
    billable: input.billable,
    text: input.description
  })

  return `✅ Time entry created: ${customer.name} (${formatHours(window.hours)}h on ${input.date}, ID: ${entry.id})`
}
