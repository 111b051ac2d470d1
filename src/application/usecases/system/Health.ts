import type { ToolContext } from "../../context.js"

export const SERVER_NAME = "Clockodo Time Tracker"
export const SERVER_VERSION = "1.0.0"

export async function health(context: ToolContext): Promise<string> {
  const { config } = context
  const lines = [
    `🩺 ${SERVER_NAME} v${SERVER_VERSION}`,
    `Transport: ${config.transport}`,
    `Read-only: ${config.readOnly ? "yes" : "no"}`,
    `Account: ${context.client.email}`,
    `Uptime: ${Math.floor(process.uptime())}s`
  ]
  return lines.join("\n")
}
