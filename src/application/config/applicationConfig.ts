import { z } from "zod"
import { ConfigurationError } from "../../shared/errors.js"

const DEFAULT_BASE_URL = "https://my.clockodo.com/api/v2/"
const DEFAULT_EXTERNAL_APPLICATION = "clockodo-mcp;contact@example.com"
const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_PORT = 8081

const NumberSchema = z.number().finite().positive()

export type TransportMode = "stdio" | "http"

export type ConfigInput = {
  email?: string
  apiKey?: string
  baseUrl?: string
  externalApplication?: string
  timeoutMs?: number
  readOnly?: boolean
  transport?: string
  port?: number
  httpToken?: string
}

export type ApplicationConfig = {
  email: string
  apiKey: string
  baseUrl: string
  externalApplication: string
  timeoutMs: number
  readOnly: boolean
  transport: TransportMode
  port: number
  httpToken?: string
}

function parsePositiveNumber(value: unknown): number | undefined {
  if (typeof value === "number" && NumberSchema.safeParse(value).success) {
    return value
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value)
    if (NumberSchema.safeParse(parsed).success) {
      return parsed
    }
  }
  return undefined
}

function parseBooleanFlag(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value
  }
  if (typeof value === "string") {
    const normalised = value.trim().toLowerCase()
    if (normalised === "") return undefined
    if (["1", "true", "yes", "y", "on"].includes(normalised)) return true
    if (["0", "false", "no", "n", "off"].includes(normalised)) return false
  }
  return undefined
}

function resolveString(candidate: string | undefined, keys: string[]) {
  const direct = candidate?.trim()
  if (direct) {
    return direct
  }
  for (const key of keys) {
    const trimmed = process.env[key]?.trim()
    if (trimmed) {
      return trimmed
    }
  }
  return undefined
}

function resolveBoolean(candidate: boolean | undefined, keys: string[]): boolean | undefined {
  if (candidate !== undefined) {
    return candidate
  }
  for (const key of keys) {
    const value = parseBooleanFlag(process.env[key])
    if (value !== undefined) {
      return value
    }
  }
  return undefined
}

function resolveNumber(candidate: number | undefined, keys: string[]): number | undefined {
  const direct = parsePositiveNumber(candidate)
  if (direct !== undefined) {
    return direct
  }
  for (const key of keys) {
    const parsed = parsePositiveNumber(process.env[key])
    if (parsed !== undefined) {
      return parsed
    }
  }
  return undefined
}

function resolveTransport(candidate?: string): TransportMode {
  const value = resolveString(candidate, ["TRANSPORT"])?.toLowerCase()
  if (value === undefined || value === "stdio") {
    return "stdio"
  }
  if (value === "http") {
    return "http"
  }
  throw new ConfigurationError(`Unsupported transport '${value}'. Use stdio or http.`)
}

function resolveBaseUrl(candidate?: string) {
  const value = resolveString(candidate, ["CLOCKODO_BASE_URL"]) ?? DEFAULT_BASE_URL
  if (!z.string().url().safeParse(value).success) {
    throw new ConfigurationError(`CLOCKODO_BASE_URL must be an absolute URL, received '${value}'`)
  }
  return value.endsWith("/") ? value : `${value}/`
}

/**
 * Builds the process configuration from explicit input, falling back to the
 * environment. Credentials are mandatory; everything else has a default.
 */
export function createApplicationConfig(input: ConfigInput = {}): ApplicationConfig {
  const email = resolveString(input.email, ["CLOCKODO_EMAIL"])
  if (!email) {
    throw new ConfigurationError("CLOCKODO_EMAIL is required")
  }
  const apiKey = resolveString(input.apiKey, ["CLOCKODO_API_KEY"])
  if (!apiKey) {
    throw new ConfigurationError("CLOCKODO_API_KEY is required")
  }

  return {
    email,
    apiKey,
    baseUrl: resolveBaseUrl(input.baseUrl),
    externalApplication:
      resolveString(input.externalApplication, ["CLOCKODO_EXTERNAL_APPLICATION"]) ?? DEFAULT_EXTERNAL_APPLICATION,
    timeoutMs: resolveNumber(input.timeoutMs, ["CLOCKODO_TIMEOUT_MS"]) ?? DEFAULT_TIMEOUT_MS,
    readOnly: resolveBoolean(input.readOnly, ["READ_ONLY_MODE", "READ_ONLY"]) ?? false,
    transport: resolveTransport(input.transport),
    port: resolveNumber(input.port, ["PORT"]) ?? DEFAULT_PORT,
    httpToken: resolveString(input.httpToken, ["MCP_HTTP_TOKEN"])
  }
}
