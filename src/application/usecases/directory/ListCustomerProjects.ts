import type { z } from "zod"
import type { CustomerProjectsInput } from "../../../mcp/schemas/directory.js"
import type { ToolContext } from "../../context.js"
import { resolveCustomer } from "../../services/NameResolver.js"
import { formatNotFound, formatProjects } from "../../presentation/formatters.js"

type Input = z.infer<typeof CustomerProjectsInput>

export async function listCustomerProjects(input: Input, context: ToolContext): Promise<string> {
  const match = await resolveCustomer(context.client, input.customer_name)
  if (!match.found) {
    return formatNotFound("customer", match)
  }
  const projects = await context.client.getProjects(match.item.id)
  return formatProjects(match.item, projects)
}
