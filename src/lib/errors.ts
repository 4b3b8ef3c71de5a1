/**
 * Raised when an analyzer receives empty or whitespace-only text.
 */
export class InvalidInputError extends Error {
  readonly field: string

  constructor(field: string, message = `${field} must be non-empty text.`) {
    super(message)
    this.name = "InvalidInputError"
    this.field = field
  }
}

/**
 * Raised when the keyword taxonomy or the environment configuration is unusable.
 * Always fatal: thrown during initialization, never per call.
 */
export class ConfigurationError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}\n${issues.map((issue) => `- ${issue}`).join("\n")}` : message)
    this.name = "ConfigurationError"
    this.issues = issues
  }
}

export class CompletionError extends Error {
  readonly attempts: number

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "CompletionError"
    this.attempts = attempts
  }
}

export class OutputValidationError extends Error {
  readonly kind: "resume" | "cover-letter" | "answer"

  constructor(kind: OutputValidationError["kind"], message: string) {
    super(message)
    this.name = "OutputValidationError"
    this.kind = kind
  }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error))

export const requireText = (value: string, field: string): string => {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InvalidInputError(field)
  }
  return value
}
