import { z } from "zod"

export const CustomerProjectsInput = z.object({
  customer_name: z.string().trim().min(1).describe("Customer name or a fragment of it.")
})
