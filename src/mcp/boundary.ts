import type { z } from "zod"
import { isAppError, ValidationError } from "../shared/errors.js"
import { describeError } from "../application/presentation/formatters.js"

function summariseIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ")
}

export function parseInput<T extends z.ZodTypeAny>(schema: T, rawInput: unknown): z.output<T> {
  const parsed = schema.safeParse(rawInput ?? {})
  if (!parsed.success) {
    throw new ValidationError(`Invalid input: ${summariseIssues(parsed.error)}`)
  }
  return parsed.data
}

export function renderFailure(action: string, error: unknown): string {
  if (isAppError(error)) {
    return error.kind === "validation" ? `❌ ${error.message}` : `❌ Error ${action}: ${describeError(error)}`
  }
  console.error(`Unexpected error ${action}:`, error)
  return `❌ Unexpected error: ${describeError(error)}`
}

/** Every tool and resource handler runs through here; failures come back as text. */
export async function runHandler(action: string, operation: () => Promise<string>): Promise<string> {
  try {
    return await operation()
  } catch (error) {
    return renderFailure(action, error)
  }
}
