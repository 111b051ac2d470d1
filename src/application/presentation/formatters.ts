import type { Customer, Project, Service, TimeEntry, User } from "../../infrastructure/clockodo/records.js"
import type { NameMatch } from "../services/NameResolver.js"
import { ClockodoRequestError } from "../../infrastructure/clockodo/ClockodoClient.js"
import {
  elapsedHours,
  formatHours,
  formatUtcClock,
  formatUtcMonthDay,
  hoursBetween,
  parseTimestamp
} from "../../shared/time.js"

const UNKNOWN_CUSTOMER = "Unknown"
const DEFAULT_PROJECT = "General"

export type ProjectSummary = {
  project: string
  hours: number
}

export type CustomerSummary = {
  customer: string
  hours: number
  projects: ProjectSummary[]
}

export type EntrySummary = {
  totalHours: number
  invalidEntries: number
  customers: CustomerSummary[]
}

/** Hours between `time_since` and `time_until`, or undefined when either fails to parse. */
export function entryDurationHours(entry: TimeEntry): number | undefined {
  return hoursBetween(entry.time_since, entry.time_until)
}

function describeAssignment(entry: TimeEntry) {
  let text = entry.customers_name ?? UNKNOWN_CUSTOMER
  if (entry.projects_name) {
    text += ` - ${entry.projects_name}`
  }
  if (entry.services_name) {
    text += ` (${entry.services_name})`
  }
  return text
}

export function formatEntryLines(entry: TimeEntry): string[] {
  const start = parseTimestamp(entry.time_since)
  const end = parseTimestamp(entry.time_until)
  if (start === undefined || end === undefined) {
    return [`• ${entry.customers_name ?? UNKNOWN_CUSTOMER} - Invalid time format (ID: ${entry.id})`]
  }
  const hours = (end - start) / 3_600_000
  const when = `${formatUtcMonthDay(start)} ${formatUtcClock(start)}-${formatUtcClock(end)}`
  const lines = [`• ${when} ${describeAssignment(entry)} [${formatHours(hours)}h] (ID: ${entry.id})`]
  if (entry.text) {
    lines.push(`  📝 ${entry.text}`)
  }
  return lines
}

export function formatEntries(label: string, entries: readonly TimeEntry[]) {
  const lines = [`📊 Time entries for ${label}:`, ""]
  let totalHours = 0
  for (const entry of entries) {
    lines.push(...formatEntryLines(entry))
    totalHours += entryDurationHours(entry) ?? 0
  }
  lines.push("", `⏱️ Total: ${formatHours(totalHours)} hours`)
  return lines.join("\n")
}

/**
 * Groups durations by customer, then project, keeping first-seen order. Sums
 * keep full precision; rounding happens when rendering.
 */
export function summariseEntries(entries: readonly TimeEntry[]): EntrySummary {
  const customers = new Map<string, Map<string, number>>()
  let totalHours = 0
  let invalidEntries = 0

  for (const entry of entries) {
    const hours = entryDurationHours(entry)
    if (hours === undefined) {
      invalidEntries += 1
      continue
    }
    totalHours += hours
    const customer = entry.customers_name ?? UNKNOWN_CUSTOMER
    const project = entry.projects_name ?? DEFAULT_PROJECT
    let projects = customers.get(customer)
    if (!projects) {
      projects = new Map()
      customers.set(customer, projects)
    }
    projects.set(project, (projects.get(project) ?? 0) + hours)
  }

  return {
    totalHours,
    invalidEntries,
    customers: Array.from(customers, ([customer, projects]) => {
      const projectSummaries = Array.from(projects, ([project, hours]) => ({ project, hours }))
      return {
        customer,
        hours: projectSummaries.reduce((sum, item) => sum + item.hours, 0),
        projects: projectSummaries
      }
    })
  }
}

export function formatSummary(label: string, summary: EntrySummary) {
  const lines = [`📊 Work Summary (${label}):`, "", `⏱️ Total Hours: ${formatHours(summary.totalHours)}h`, ""]
  for (const customer of summary.customers) {
    lines.push(`👤 ${customer.customer}: ${formatHours(customer.hours)}h`)
    for (const project of customer.projects) {
      lines.push(`  📁 ${project.project}: ${formatHours(project.hours)}h`)
    }
    lines.push("")
  }
  if (summary.invalidEntries > 0) {
    const noun = summary.invalidEntries === 1 ? "entry" : "entries"
    lines.push(`⚠️ ${summary.invalidEntries} ${noun} skipped: invalid time format`)
  }
  return lines.join("\n").trimEnd()
}

export function formatRunningEntry(entry: TimeEntry, now: Date) {
  const lines = [`⏰ Currently tracking: ${describeAssignment(entry)}`]
  if (entry.text) {
    lines.push(`Description: ${entry.text}`)
  }
  const start = parseTimestamp(entry.time_since)
  const hours = elapsedHours(entry.time_since, now)
  if (start !== undefined && hours !== undefined) {
    lines.push(`Duration: ${formatHours(hours)} hours (started ${formatUtcClock(start)})`)
  } else {
    lines.push(`Started: ${entry.time_since}`)
  }
  return lines.join("\n")
}

export function formatCustomers(customers: readonly Customer[]) {
  if (customers.length === 0) {
    return "No customers found"
  }
  return ["👥 Customers:", "", ...customers.map((customer) => `• ${customer.name} (ID: ${customer.id})`)].join("\n")
}

export function formatProjects(customer: Customer, projects: readonly Project[]) {
  if (projects.length === 0) {
    return `No projects found for ${customer.name}`
  }
  return [
    `📁 Projects for ${customer.name}:`,
    "",
    ...projects.map((project) => `• ${project.name} (ID: ${project.id})`)
  ].join("\n")
}

export function formatServices(services: readonly Service[]) {
  if (services.length === 0) {
    return "No services found"
  }
  return ["🔧 Services:", "", ...services.map((service) => `• ${service.name} (ID: ${service.id})`)].join("\n")
}

export function formatUsers(users: readonly User[]) {
  if (users.length === 0) {
    return "No users found"
  }
  const blocks = users.map((user) => {
    const status = user.active ? "✅ Active" : "❌ Inactive"
    return [
      `• ${user.name} (ID: ${user.id})`,
      `  📧 ${user.email || "No email"}`,
      `  🎭 Role: ${user.role ?? "Unknown"} | Status: ${status}`
    ].join("\n")
  })
  return ["👥 Users:", "", blocks.join("\n\n")].join("\n")
}

type NotFound = Extract<NameMatch<{ id: number; name: string }>, { found: false }>

export function formatNotFound(kind: "customer" | "project" | "service", match: NotFound, scope?: string) {
  const label = `${kind.charAt(0).toUpperCase()}${kind.slice(1)}`
  const subject = scope ? `${label} '${match.query}' not found for customer '${scope}'` : `${label} '${match.query}' not found`
  if (match.available.length === 0) {
    return `${subject}. No ${kind}s available.`
  }
  return `${subject}. Available ${kind}s: ${match.available.join(", ")}`
}

/** Text for a failure; the only place errors are turned into words. */
export function describeError(error: unknown): string {
  if (error instanceof ClockodoRequestError) {
    return error.statusCode === undefined
      ? `Request failed: ${error.message}`
      : `API Error ${error.statusCode}: ${error.message}`
  }
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
