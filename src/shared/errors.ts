export type ErrorKind = "configuration" | "domain" | "validation"

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind
}

/** Missing or malformed settings; fatal at startup. */
export class ConfigurationError extends AppError {
  readonly kind = "configuration" as const

  constructor(message: string) {
    super(message)
    this.name = "ConfigurationError"
  }
}

/** Caller input rejected before any remote call is made. */
export class ValidationError extends AppError {
  readonly kind = "validation" as const
  readonly field?: string

  constructor(message: string, options?: { field?: string }) {
    super(message)
    this.name = "ValidationError"
    this.field = options?.field
  }
}

export class DomainError extends AppError {
  readonly kind = "domain" as const
  readonly statusCode?: number

  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = "DomainError"
    this.statusCode = options?.statusCode
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}
