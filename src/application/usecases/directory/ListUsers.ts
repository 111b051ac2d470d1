import type { ToolContext } from "../../context.js"
import { formatUsers } from "../../presentation/formatters.js"

export async function listUsers(context: ToolContext): Promise<string> {
  return formatUsers(await context.client.getUsers())
}
