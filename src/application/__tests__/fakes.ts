import type { ClockodoClient } from "../../infrastructure/clockodo/ClockodoClient.js"
import type { Customer, Project, Service, TimeEntry, User } from "../../infrastructure/clockodo/records.js"
import type { ApplicationConfig } from "../config/applicationConfig.js"
import type { ToolContext } from "../context.js"

export const customers: Customer[] = [
  { id: 7, name: "Acme Corp", active: true },
  { id: 8, name: "Globex", active: true }
]

export const projects: Project[] = [
  { id: 21, name: "Website Relaunch", customers_id: 7, active: true },
  { id: 22, name: "Support", customers_id: 7, active: true }
]

export const services: Service[] = [
  { id: 3, name: "Development", active: true },
  { id: 4, name: "Consulting", active: true }
]

export const users: User[] = [
  { id: 42, name: "Dana Dev", email: "dev@example.com", role: "worker", active: true },
  { id: 43, name: "Sam Other", email: "other@example.com", role: "owner", active: false }
]

export function timeEntry(overrides: Partial<TimeEntry> = {}): TimeEntry {
  return {
    id: 11,
    customers_id: 7,
    projects_id: 21,
    services_id: 3,
    users_id: 42,
    time_since: "2024-01-15T09:00:00Z",
    time_until: "2024-01-15T17:30:00Z",
    billable: true,
    text: undefined,
    customers_name: "Acme Corp",
    projects_name: "Website Relaunch",
    services_name: "Development",
    ...overrides
  }
}

export const testConfig: ApplicationConfig = {
  email: "dev@example.com",
  apiKey: "test-api-key",
  baseUrl: "https://clockodo.test/api/v2/",
  externalApplication: "clockodo-mcp;test@example.com",
  timeoutMs: 1000,
  readOnly: false,
  transport: "stdio",
  port: 8081
}

export function createClient(overrides: Partial<ClockodoClient>): ClockodoClient {
  return { email: "dev@example.com", ...overrides } as unknown as ClockodoClient
}

export function createContext(
  overrides: Partial<ClockodoClient>,
  options: { now?: Date; config?: Partial<ApplicationConfig> } = {}
): ToolContext {
  const now = options.now ?? new Date("2024-01-15T12:00:00Z")
  return {
    client: createClient(overrides),
    config: { ...testConfig, ...options.config },
    now: () => now
  }
}
