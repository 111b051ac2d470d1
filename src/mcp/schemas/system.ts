import { z } from "zod"

export const HealthInput = z.object({})
