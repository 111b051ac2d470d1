import type { ToolContext } from "../../context.js"
import { formatCustomers } from "../../presentation/formatters.js"

export async function listCustomers(context: ToolContext): Promise<string> {
  return formatCustomers(await context.client.getCustomers())
}
