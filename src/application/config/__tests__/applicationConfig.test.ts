import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { ConfigurationError } from "../../../shared/errors.js"
import { createApplicationConfig } from "../applicationConfig.js"

const KEYS = [
  "CLOCKODO_EMAIL",
  "CLOCKODO_API_KEY",
  "CLOCKODO_BASE_URL",
  "CLOCKODO_EXTERNAL_APPLICATION",
  "CLOCKODO_TIMEOUT_MS",
  "READ_ONLY_MODE",
  "READ_ONLY",
  "TRANSPORT",
  "PORT",
  "MCP_HTTP_TOKEN"
]

describe("createApplicationConfig", () => {
  const saved = new Map<string, string | undefined>()

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key])
      delete process.env[key]
    }
  })

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key]
      } else {
        process.env[key] = value
      }
    }
  })

  it("applies defaults around the credentials", () => {
    expect(createApplicationConfig({ email: "dev@example.com", apiKey: "test-api-key" })).toEqual({
      email: "dev@example.com",
      apiKey: "test-api-key",
      baseUrl: "https://my.clockodo.com/api/v2/",
      externalApplication: "clockodo-mcp;contact@example.com",
      timeoutMs: 30000,
      readOnly: false,
      transport: "stdio",
      port: 8081,
      httpToken: undefined
    })
  })

  it("reads the environment", () => {
    process.env.CLOCKODO_EMAIL = " dev@example.com "
    process.env.CLOCKODO_API_KEY = "test-api-key"
    process.env.CLOCKODO_BASE_URL = "https://clockodo.test/api/v2"
    process.env.CLOCKODO_TIMEOUT_MS = "5000"
    process.env.READ_ONLY = "yes"
    process.env.TRANSPORT = "HTTP"
    process.env.PORT = "9000"
    process.env.MCP_HTTP_TOKEN = "test-token"

    const config = createApplicationConfig()

    expect(config.email).toBe("dev@example.com")
    expect(config.baseUrl).toBe("https://clockodo.test/api/v2/")
    expect(config.timeoutMs).toBe(5000)
    expect(config.readOnly).toBe(true)
    expect(config.transport).toBe("http")
    expect(config.port).toBe(9000)
    expect(config.httpToken).toBe("test-token")
  })

  it("prefers explicit input over the environment", () => {
    process.env.READ_ONLY_MODE = "true"

    const config = createApplicationConfig({ email: "dev@example.com", apiKey: "test-api-key", readOnly: false })

    expect(config.readOnly).toBe(false)
  })

  it("ignores unusable numbers", () => {
    process.env.CLOCKODO_TIMEOUT_MS = "soon"

    expect(createApplicationConfig({ email: "dev@example.com", apiKey: "test-api-key" }).timeoutMs).toBe(30000)
  })

  it("requires both credentials", () => {
    expect(() => createApplicationConfig({ apiKey: "test-api-key" })).toThrow(
      new ConfigurationError("CLOCKODO_EMAIL is required")
    )
    expect(() => createApplicationConfig({ email: "dev@example.com" })).toThrow("CLOCKODO_API_KEY is required")
  })

  it("rejects an unknown transport and a relative base URL", () => {
    const credentials = { email: "dev@example.com", apiKey: "test-api-key" }

    expect(() => createApplicationConfig({ ...credentials, transport: "sse" })).toThrow(
      "Unsupported transport 'sse'. Use stdio or http."
    )
    expect(() => createApplicationConfig({ ...credentials, baseUrl: "api/v2" })).toThrow(ConfigurationError)
  })
})
