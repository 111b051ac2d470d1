export type SafetyInput = {
  confirm?: string
  dryRun?: boolean
}

type Handler<T extends SafetyInput> = (input: T) => Promise<string>

export const CONFIRMATION_REQUIRED =
  'Confirmation required. Resend with confirm: "yes" or set dryRun: true for a preview.'

/** Runs `handler` only for a dry run or an explicit `confirm: "yes"`. */
export function withSafetyConfirmation<T extends SafetyInput>(handler: Handler<T>): Handler<T> {
  return async (input: T) => {
    if (input.dryRun) {
      return handler({ ...input, dryRun: true })
    }

    if (input.confirm?.trim().toLowerCase() !== "yes") {
      return CONFIRMATION_REQUIRED
    }

    return handler({ ...input, dryRun: false })
  }
}
