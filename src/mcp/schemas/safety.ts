import { z } from "zod"

export const SafetyInput = z.object({
  confirm: z.string().describe('Send "yes" to perform the change.').optional(),
  dryRun: z.boolean().describe("Preview the change without writing it.").optional()
})
