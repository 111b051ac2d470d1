import { ResourceTemplate, type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { Variables } from "@modelcontextprotocol/sdk/shared/uriTemplate.js"
import type { ToolContext } from "../application/context.js"
import { PERIOD_NAMES } from "../application/services/PeriodCalculator.js"
import { listTimeEntries } from "../application/usecases/entries/ListTimeEntries.js"
import { listCustomers } from "../application/usecases/directory/ListCustomers.js"
import { listCustomerProjects } from "../application/usecases/directory/ListCustomerProjects.js"
import { listServices } from "../application/usecases/directory/ListServices.js"
import { listUsers } from "../application/usecases/directory/ListUsers.js"
import { ValidationError } from "../shared/errors.js"
import { CustomerProjectsInput } from "./schemas/index.js"
import { parseInput, runHandler } from "./boundary.js"

const TEXT = "text/plain"

function formatResourceContent(uri: URL, text: string) {
  return {
    contents: [
      {
        uri: uri.toString(),
        mimeType: TEXT,
        text
      }
    ]
  }
}

function readVariable(variables: Variables, name: string) {
  const raw = variables[name]
  const value = Array.isArray(raw) ? raw[0] : raw
  if (value === undefined) {
    throw new ValidationError(`Missing ${name} in resource URI`, { field: name })
  }
  try {
    return decodeURIComponent(value)
  } catch {
    throw new ValidationError(`Malformed ${name} in resource URI: '${value}'`, { field: name })
  }
}

export type ResourceReaders = {
  entries: (variables: Variables) => Promise<string>
  customers: () => Promise<string>
  projects: (variables: Variables) => Promise<string>
  services: () => Promise<string>
  users: () => Promise<string>
}

export function createResourceReaders(context: ToolContext): ResourceReaders {
  return {
    entries: (variables) =>
      runHandler("getting time entries", () => listTimeEntries({ period: readVariable(variables, "period") }, context)),
    customers: () => runHandler("getting customers", () => listCustomers(context)),
    projects: (variables) =>
      runHandler("getting projects", () =>
        listCustomerProjects(
          parseInput(CustomerProjectsInput, { customer_name: readVariable(variables, "customer_name") }),
          context
        )
      ),
    services: () => runHandler("getting services", () => listServices(context)),
    users: () => runHandler("getting users", () => listUsers(context))
  }
}

export function registerResources(server: McpServer, context: ToolContext) {
  const read = createResourceReaders(context)

  const entriesTemplate = new ResourceTemplate("entries://{period}", {
    list: async () => ({
      resources: PERIOD_NAMES.map((period) => ({
        name: `entries-${period}`,
        uri: `entries://${period}`,
        title: `Time entries (${period})`,
        mimeType: TEXT
      }))
    })
  })
  server.registerResource(
    "time-entries",
    entriesTemplate,
    { title: "Time entries", description: "Your time entries for today, yesterday, week or month.", mimeType: TEXT },
    async (uri, variables) => formatResourceContent(uri, await read.entries(variables))
  )

  server.registerResource(
    "customers",
    "customers://all",
    { title: "Customers", description: "All customers with their IDs.", mimeType: TEXT },
    async (uri) => formatResourceContent(uri, await read.customers())
  )

  server.registerResource(
    "customer-projects",
    new ResourceTemplate("projects://{customer_name}", { list: undefined }),
    { title: "Projects", description: "Projects of a customer, matched by name.", mimeType: TEXT },
    async (uri, variables) => formatResourceContent(uri, await read.projects(variables))
  )

  server.registerResource(
    "services",
    "services://all",
    { title: "Services", description: "All services with their IDs.", mimeType: TEXT },
    async (uri) => formatResourceContent(uri, await read.services())
  )

  server.registerResource(
    "users",
    "users://all",
    { title: "Users", description: "All users with email, role and status.", mimeType: TEXT },
    async (uri) => formatResourceContent(uri, await read.users())
  )
}
