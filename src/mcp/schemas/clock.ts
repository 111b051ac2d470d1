import { z } from "zod"

const Name = z.string().trim().min(1)

export const StartTimeTrackingInput = z.object({
  customer_name: Name.describe("Customer name or a fragment of it; matched case-insensitively."),
  project_name: Name.describe("Project of that customer to book on.").optional(),
  service_name: Name.describe("Service (activity) to book on.").optional(),
  description: z.string().describe("Free-text description for the entry.").optional(),
  billable: z.boolean().default(true).describe("Whether the tracked time is billable.")
})

export const StopTimeTrackingInput = z.object({})

export const GetRunningEntryInput = z.object({})
