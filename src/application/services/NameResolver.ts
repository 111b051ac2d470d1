import type { ClockodoClient } from "../../infrastructure/clockodo/ClockodoClient.js"
import type { Customer, Project, Service } from "../../infrastructure/clockodo/records.js"

const SUGGESTION_LIMIT = 5

type Named = { id: number; name: string }

export type NameMatch<T extends Named> =
  | { found: true; item: T }
  | { found: false; query: string; available: string[] }

/**
 * First candidate, in API order, whose name contains the query ignoring case.
 * Ambiguous queries resolve to the earliest listed candidate.
 */
export function findByName<T extends Named>(candidates: readonly T[], query: string): T | undefined {
  const needle = query.trim().toLowerCase()
  if (!needle) {
    return undefined
  }
  return candidates.find((candidate) => candidate.name.toLowerCase().includes(needle))
}

export function matchByName<T extends Named>(candidates: readonly T[], query: string): NameMatch<T> {
  const item = findByName(candidates, query)
  if (item) {
    return { found: true, item }
  }
  return {
    found: false,
    query,
    available: candidates.slice(0, SUGGESTION_LIMIT).map((candidate) => candidate.name)
  }
}

export async function resolveCustomer(client: ClockodoClient, name: string): Promise<NameMatch<Customer>> {
  return matchByName(await client.getCustomers(), name)
}

/** Only the given customer's projects are considered. */
export async function resolveProject(
  client: ClockodoClient,
  customer: Customer,
  name: string
): Promise<NameMatch<Project>> {
  return matchByName(await client.getProjects(customer.id), name)
}

export async function resolveService(client: ClockodoClient, name: string): Promise<NameMatch<Service>> {
  return matchByName(await client.getServices(), name)
}
