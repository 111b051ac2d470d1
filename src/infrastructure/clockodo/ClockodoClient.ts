import { z } from "zod"
import { ConfigurationError, DomainError } from "../../shared/errors.js"
import { addDays, formatDate, formatDateEnd } from "../../shared/time.js"
import {
  AcknowledgementResponse,
  ClockResponse,
  CustomersResponse,
  EntriesResponse,
  EntryResponse,
  ProjectsResponse,
  ServicesResponse,
  StopClockResponse,
  UsersResponse,
  type Customer,
  type EntryUpdate,
  type Project,
  type Service,
  type TimeEntry,
  type User
} from "./records.js"

const DEFAULT_BASE_URL = "https://my.clockodo.com/api/v2/"
const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_EXTERNAL_APPLICATION = "clockodo-mcp;contact@example.com"

type SearchParamPrimitive = string | number | boolean
type SearchParams = Record<string, SearchParamPrimitive | undefined>

type RequestOptions = {
  method?: string
  body?: Record<string, unknown>
  searchParams?: SearchParams
}

export type ClockodoErrorUpstream = {
  method: string
  path: string
  body?: unknown
}

export type ClockodoRequestErrorShape = {
  statusCode?: number
  message: string
  upstream: ClockodoErrorUpstream
}

/**
 * Any failed call against the API. `statusCode` is present for HTTP error
 * responses and absent for transport or decode failures.
 */
export class ClockodoRequestError extends DomainError {
  readonly upstream: ClockodoErrorUpstream

  constructor({ statusCode, message, upstream }: ClockodoRequestErrorShape, options?: { cause?: unknown }) {
    super(message, { statusCode, cause: options?.cause })
    this.name = "ClockodoRequestError"
    this.upstream = upstream
  }
}

const ErrorBody = z.object({
  error: z.union([z.string(), z.object({ message: z.string().optional() })]).optional(),
  message: z.string().optional()
})

function extractErrorMessage(body: unknown): string | undefined {
  const parsed = ErrorBody.safeParse(body)
  if (!parsed.success) {
    return undefined
  }
  const { error, message } = parsed.data
  const candidates = [
    typeof error === "object" ? error.message : undefined,
    message,
    typeof error === "string" ? error : undefined
  ]
  return candidates.find((candidate): candidate is string => typeof candidate === "string" && candidate.trim() !== "")
}

function parseJson(rawBody: string): unknown {
  try {
    return JSON.parse(rawBody)
  } catch {
    return rawBody
  }
}

function describeTransportFailure(error: unknown, timeoutMs: number) {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `request timed out after ${timeoutMs}ms`
    }
    return error.message
  }
  return String(error)
}

function summariseIssues(error: z.ZodError) {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ")
}

function toRequestError(error: unknown, upstream: ClockodoErrorUpstream) {
  if (error instanceof ClockodoRequestError) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new ClockodoRequestError({ message, upstream }, { cause: error })
}

function mondayIndex(date: Date) {
  return (date.getDay() + 6) % 7
}

export type ClockodoClientOptions = {
  email?: string
  apiKey?: string
  baseUrl?: string
  timeoutMs?: number
  externalApplication?: string
}

export type StartClockInput = {
  customersId: number
  projectsId?: number
  servicesId?: number
  billable?: boolean
  text?: string
}

export type CreateEntryInput = StartClockInput & {
  timeSince: string
  timeUntil: string
}

export type EntryFilters = {
  customersId?: number
  projectsId?: number
  billable?: boolean
}

export type ClockState =
  | { running: true; entry: TimeEntry }
  | { running: false; error?: ClockodoRequestError }

export type DeleteOutcome =
  | { deleted: true; entryId: number }
  | { deleted: false; entryId: number; error: ClockodoRequestError }

export class ClockodoClient {
  readonly email: string
  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly externalApplication: string

  constructor(options: ClockodoClientOptions) {
    const email = options.email?.trim()
    const apiKey = options.apiKey?.trim()
    if (!email || !apiKey) {
      throw new ConfigurationError("Clockodo email and API key must be provided")
    }
    this.email = email
    this.apiKey = apiKey
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.externalApplication = options.externalApplication ?? DEFAULT_EXTERNAL_APPLICATION
  }

  private async request<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    options: RequestOptions = {}
  ): Promise<z.output<T>> {
    const url = new URL(path, this.baseUrl)
    if (options.searchParams) {
      Object.entries(options.searchParams).forEach(([key, value]) => {
        if (value === undefined) {
          return
        }
        url.searchParams.set(key, typeof value === "boolean" ? (value ? "1" : "0") : String(value))
      })
    }

    const method = options.method ?? "GET"
    const upstream: ClockodoErrorUpstream = { method, path }

    let response: Response
    let rawBody: string
    try {
      response = await fetch(url, {
        method,
        headers: {
          "X-ClockodoApiUser": this.email,
          "X-ClockodoApiKey": this.apiKey,
          "X-Clockodo-External-Application": this.externalApplication,
          "Content-Type": "application/json",
          Accept: "application/json"
        },
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs)
      })
      rawBody = await response.text()
    } catch (error) {
      const message = describeTransportFailure(error, this.timeoutMs)
      console.error(`Clockodo ${method} /${path} failed: ${message}`)
      throw new ClockodoRequestError({ message, upstream }, { cause: error })
    }

    if (!response.ok) {
      const body = rawBody ? parseJson(rawBody) : undefined
      const message =
        extractErrorMessage(body) ?? (rawBody.trim() || response.statusText || `HTTP ${response.status}`)
      console.error(`Clockodo ${method} /${path} returned ${response.status}: ${message}`)
      throw new ClockodoRequestError({
        statusCode: response.status,
        message,
        upstream: { ...upstream, body }
      })
    }

    let payload: unknown = {}
    if (rawBody.trim()) {
      try {
        payload = JSON.parse(rawBody)
      } catch (error) {
        console.error(`Clockodo ${method} /${path} returned a body that is not JSON`)
        throw new ClockodoRequestError({ message: "response body is not valid JSON", upstream }, { cause: error })
      }
    }

    const decoded = schema.safeParse(payload)
    if (!decoded.success) {
      const message = `unexpected response shape (${summariseIssues(decoded.error)})`
      console.error(`Clockodo ${method} /${path} ${message}`)
      throw new ClockodoRequestError({ message, upstream: { ...upstream, body: payload } })
    }
    return decoded.data
  }

  async startClock(input: StartClockInput): Promise<TimeEntry | undefined> {
    const body: Record<string, unknown> = {
      customers_id: input.customersId,
      billable: input.billable ?? true
    }
    if (input.projectsId !== undefined) body.projects_id = input.projectsId
    if (input.servicesId !== undefined) body.services_id = input.servicesId
    if (input.text) body.text = input.text

    const result = await this.request("clock", ClockResponse, { method: "POST", body })
    return result.running ?? result.running_entry ?? undefined
  }

  async stopClock(): Promise<TimeEntry | undefined> {
    const result = await this.request("clock", StopClockResponse, { method: "DELETE" })
    return result.stopped ?? undefined
  }

  /** Never rejects: a failed lookup reports "not running" with the failure attached. */
  async getClock(): Promise<ClockState> {
    try {
      const result = await this.request("clock", ClockResponse)
      const entry = result.running ?? result.running_entry
      return entry ? { running: true, entry } : { running: false }
    } catch (error) {
      return { running: false, error: toRequestError(error, { method: "GET", path: "clock" }) }
    }
  }

  async getEntries(timeSince: string, timeUntil: string, filters: EntryFilters = {}): Promise<TimeEntry[]> {
    const result = await this.request("entries", EntriesResponse, {
      searchParams: {
        time_since: timeSince,
        time_until: timeUntil,
        customers_id: filters.customersId,
        projects_id: filters.projectsId,
        billable: filters.billable
      }
    })
    return result.entries ?? []
  }

  async createEntry(input: CreateEntryInput): Promise<TimeEntry> {
    const body: Record<string, unknown> = {
      customers_id: input.customersId,
      time_since: input.timeSince,
      time_until: input.timeUntil,
      billable: input.billable ?? true
    }
    if (input.projectsId !== undefined) body.projects_id = input.projectsId
    if (input.servicesId !== undefined) body.services_id = input.servicesId
    if (input.text) body.text = input.text

    const result = await this.request("entries", EntryResponse, { method: "POST", body })
    return result.entry
  }

  async updateEntry(entryId: number, fields: EntryUpdate): Promise<TimeEntry> {
    const body: Record<string, unknown> = {}
    Object.entries(fields).forEach(([key, value]) => {
      if (value !== undefined) {
        body[key] = value
      }
    })
    const result = await this.request(`entries/${entryId}`, EntryResponse, { method: "PUT", body })
    return result.entry
  }

  /** Never rejects; the outcome says whether the entry is gone. */
  async deleteEntry(entryId: number): Promise<DeleteOutcome> {
    const path = `entries/${entryId}`
    try {
      await this.request(path, AcknowledgementResponse, { method: "DELETE" })
      return { deleted: true, entryId }
    } catch (error) {
      return { deleted: false, entryId, error: toRequestError(error, { method: "DELETE", path }) }
    }
  }

  async getCustomers(): Promise<Customer[]> {
    const result = await this.request("customers", CustomersResponse)
    return result.customers ?? []
  }

  async getProjects(customersId?: number): Promise<Project[]> {
    const result = await this.request("projects", ProjectsResponse, {
      searchParams: { customers_id: customersId }
    })
    return result.projects ?? []
  }

  async getServices(): Promise<Service[]> {
    const result = await this.request("services", ServicesResponse)
    return result.services ?? []
  }

  async getUsers(): Promise<User[]> {
    const result = await this.request("users", UsersResponse)
    return result.users ?? []
  }

  async getCurrentUserId(): Promise<number> {
    const users = await this.getUsers()
    const email = this.email.toLowerCase()
    const current = users.find((user) => user.email.trim().toLowerCase() === email)
    if (!current) {
      console.error(`Clockodo user ${this.email} not found in the user list`)
      throw new DomainError(`User with email ${this.email} not found`, { statusCode: 404 })
    }
    return current.id
  }

  /** Week 1 starts on the Monday on or before 1 January of `year`. */
  async getWeekEntries(year: number, week: number): Promise<TimeEntry[]> {
    const januaryFirst = new Date(year, 0, 1)
    const weekStart = addDays(januaryFirst, (week - 1) * 7 - mondayIndex(januaryFirst))
    const weekEnd = addDays(weekStart, 6)
    return this.getEntries(formatDate(weekStart), formatDateEnd(weekEnd))
  }
}
