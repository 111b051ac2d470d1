import { z } from "zod"

const Id = z.number().int()
const OptionalId = Id.nullish().transform((value) => value ?? undefined)
const OptionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined)

// The API reports billability as 0/1/2 (2 = already billed); older payloads use booleans.
const Billable = z
  .union([z.boolean(), z.number()])
  .transform((value) => (typeof value === "boolean" ? value : value > 0))

const ActiveFlag = z
  .union([z.boolean(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : Boolean(value)))

export const CustomerSchema = z.object({
  id: Id,
  name: z.string(),
  active: ActiveFlag
})

export const ProjectSchema = z.object({
  id: Id,
  name: z.string(),
  customers_id: Id,
  active: ActiveFlag
})

export const ServiceSchema = z.object({
  id: Id,
  name: z.string(),
  active: ActiveFlag
})

export const UserSchema = z.object({
  id: Id,
  name: z.string(),
  email: z.string(),
  role: OptionalText,
  active: ActiveFlag
})

export const TimeEntrySchema = z.object({
  id: Id,
  customers_id: Id,
  projects_id: OptionalId,
  services_id: OptionalId,
  users_id: Id,
  time_since: z.string(),
  time_until: OptionalText,
  billable: Billable.default(false),
  text: OptionalText,
  customers_name: OptionalText,
  projects_name: OptionalText,
  services_name: OptionalText
})

export type Customer = z.infer<typeof CustomerSchema>
export type Project = z.infer<typeof ProjectSchema>
export type Service = z.infer<typeof ServiceSchema>
export type User = z.infer<typeof UserSchema>
export type TimeEntry = z.infer<typeof TimeEntrySchema>

export const CustomersResponse = z.object({ customers: z.array(CustomerSchema).nullish() })
export const ProjectsResponse = z.object({ projects: z.array(ProjectSchema).nullish() })
export const ServicesResponse = z.object({ services: z.array(ServiceSchema).nullish() })
export const UsersResponse = z.object({ users: z.array(UserSchema).nullish() })
export const EntriesResponse = z.object({ entries: z.array(TimeEntrySchema).nullish() })
export const EntryResponse = z.object({ entry: TimeEntrySchema })
export const ClockResponse = z.object({
  running: TimeEntrySchema.nullish(),
  running_entry: TimeEntrySchema.nullish()
})
export const StopClockResponse = z.object({ stopped: TimeEntrySchema.nullish() })
export const AcknowledgementResponse = z.object({ success: z.boolean().optional() })

/** Fields accepted by PUT /entries/{id}; absent keys are left untouched. */
export type EntryUpdate = {
  customers_id?: number
  projects_id?: number
  services_id?: number
  time_since?: string
  time_until?: string
  billable?: boolean
  text?: string
}
