import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { ToolContext } from "../application/context.js"
import { SERVER_NAME, SERVER_VERSION } from "../application/usecases/system/Health.js"
import { registerTools } from "../mcp/registerTools.js"
import { registerResources } from "../mcp/registerResources.js"

export function createServer(context: ToolContext) {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  })
  registerTools(server, context)
  registerResources(server, context)
  return server
}
