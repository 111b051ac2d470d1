import type { z } from "zod"
import type { StartTimeTrackingInput } from "../../../mcp/schemas/clock.js"
import type { ToolContext } from "../../context.js"
import { resolveCustomer, resolveProject, resolveService } from "../../services/NameResolver.js"
import { formatNotFound } from "../../presentation/formatters.js"

type Input = z.infer<typeof StartTimeTrackingInput>

export async function startTimeTracking(input: Input, context: ToolContext): Promise<string> {
  const { client } = context

  const customerMatch = await resolveCustomer(client, input.customer_name)
  if (!customerMatch.found) {
    return formatNotFound("customer", customerMatch)
  }
  const customer = customerMatch.item

  let project: { id: number; name: string } | undefined
  if (input.project_name) {
    const match = await resolveProject(client, customer, input.project_name)
    if (!match.found) {
      return formatNotFound("project", match, customer.name)
    }
    project = match.item
  }

  let service: { id: number; name: string } | undefined
  if (input.service_name) {
    const match = await resolveService(client, input.service_name)
    if (!match.found) {
      return formatNotFound("service", match)
    }
    service = match.item
  }

  await client.startClock({
    customersId: customer.id,
    projectsId: project?.id,
    servicesId: service?.id,
    billable: input.billable,
    text: input.description
  })

  let message = `✅ Time tracking started for ${customer.name}`
  if (project) message += ` - ${project.name}`
  if (service) message += ` (${service.name})`
  return message
}
