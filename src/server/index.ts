#!/usr/bin/env node
import "dotenv/config"
import express from "express"
import cors from "cors"
import { createApplicationConfig } from "../application/config/applicationConfig.js"
import { createToolContext } from "../application/context.js"
import { createCorsOptions } from "./cors.js"
import { registerHealthEndpoint } from "./health.js"
import { registerHttpTransport } from "./httpTransport.js"
import { startStdioTransport } from "./stdioTransport.js"
import { createServer } from "./factory.js"

async function start() {
  const config = createApplicationConfig()
  const context = createToolContext(config)

  if (config.transport === "http") {
    const app = express()
    app.use(cors(createCorsOptions()))
    app.use(express.json({ limit: "1mb" }))
    registerHealthEndpoint(app, config)
    registerHttpTransport(app, () => createServer(context), { token: config.httpToken })
    app.listen(config.port, () => {
      console.error(`Clockodo MCP server listening on http://localhost:${config.port}/mcp`)
    })
    return
  }

  await startStdioTransport(createServer(context))
}

start().catch((error: unknown) => {
  console.error("Failed to start Clockodo MCP server:", error instanceof Error ? error.message : error)
  process.exitCode = 1
})
