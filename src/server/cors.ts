import type { CorsOptions } from "cors"

export function createCorsOptions(): CorsOptions {
  return {
    origin: true,
    allowedHeaders: ["content-type", "authorization", "mcp-session-id", "mcp-protocol-version", "last-event-id"],
    exposedHeaders: ["mcp-session-id", "mcp-protocol-version"],
    // DELETE ends a streamable HTTP session.
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    preflightContinue: false
  }
}
