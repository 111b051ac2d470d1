import type { ToolContext } from "../../context.js"
import { formatServices } from "../../presentation/formatters.js"

export async function listServices(context: ToolContext): Promise<string> {
  return formatServices(await context.client.getServices())
}
