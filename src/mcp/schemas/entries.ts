import { z } from "zod"
import { SafetyInput } from "./safety.js"

const Name = z.string().trim().min(1)
const EntryId = z.coerce.number().int().positive().describe("Numeric time entry ID, as shown in entry listings.")
const DateString = z.string().describe("Date in YYYY-MM-DD format.")
const TimeString = z.string().describe("Local time in HH:MM (24h) format.")

export const CreateTimeEntryInput = z.object({
  customer_name: Name.describe("Customer name or a fragment of it; matched case-insensitively."),
  date: DateString,
  start_time: TimeString.describe("Start time in HH:MM (24h) format."),
  end_time: TimeString.describe("End time in HH:MM (24h) format."),
  project_name: Name.describe("Project of that customer.").optional(),
  service_name: Name.describe("Service (activity) for the entry.").optional(),
  description: z.string().describe("Free-text description for the entry.").optional(),
  billable: z.boolean().default(true).describe("Whether the entry is billable.")
})

export const UpdateTimeEntryInput = SafetyInput.extend({
  entry_id: EntryId,
  date: DateString.describe("Date the new start/end times apply to (YYYY-MM-DD).").optional(),
  start_time: TimeString.describe("New start time in HH:MM (24h) format; requires date.").optional(),
  end_time: TimeString.describe("New end time in HH:MM (24h) format; requires date.").optional(),
  customer_name: Name.describe("Move the entry to this customer.").optional(),
  project_name: Name.describe("Move the entry to this project; requires customer_name.").optional(),
  service_name: Name.describe("Move the entry to this service.").optional(),
  description: z.string().describe("Replacement description.").optional(),
  billable: z.boolean().describe("New billable flag.").optional()
})

export const DeleteTimeEntryInput = SafetyInput.extend({
  entry_id: EntryId
})

export const ListTimeEntriesInput = z.object({
  period: z.string().default("today").describe("One of today, yesterday, week, month.")
})

export const ListWeekEntriesInput = z.object({
  year: z.number().int().min(2000).max(2100).describe("Calendar year, e.g. 2024."),
  week: z.number().int().min(1).max(53).describe("Week number; week 1 starts on the Monday on or before 1 January.")
})

export const WorkSummaryInput = z.object({
  period: z.string().default("week").describe("One of today, yesterday, week, month.")
})
