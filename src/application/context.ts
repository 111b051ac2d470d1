import type { ApplicationConfig } from "./config/applicationConfig.js"
import { ClockodoClient } from "../infrastructure/clockodo/ClockodoClient.js"

/**
 * Handle passed to every tool and resource handler. Built once at startup and
 * shared read-only between concurrent invocations.
 */
export type ToolContext = {
  client: ClockodoClient
  config: ApplicationConfig
  now: () => Date
}

export function createToolContext(config: ApplicationConfig): ToolContext {
  const client = new ClockodoClient({
    email: config.email,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    externalApplication: config.externalApplication
  })
  return { client, config, now: () => new Date() }
}
