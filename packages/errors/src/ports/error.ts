export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error, such as the offending capacity or the
 * function index a caller asked for.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase identifier for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * Whether the failure is an expected outcome of bad input or exhausted
   * resources (`true`), or a bug inside the library (`false`).
   *
   * @remarks
   * A table that raised a non-operational error may no longer satisfy its
   * placement invariant and should be discarded.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and test assertions.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
