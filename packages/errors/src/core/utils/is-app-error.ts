import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard for values carrying the `AppError` fields, whether or not they
 * were constructed from `BaseError`.
 *
 * @example
 * ```ts
 * try {
 *   new CuckooTable(family)
 * } catch (err) {
 *   if (isAppError(err) && err.code === "invalid_configuration") {
 *     logger.error("table rejected its hash family", { err })
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  const timestamp = e.timestamp

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    timestamp instanceof Date &&
    Number.isFinite(timestamp.valueOf()) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
