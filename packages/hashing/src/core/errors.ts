import { BaseError, type ErrorContext } from "@multiprobe/errors"

/**
 * Invalid construction parameters or misuse of an index. Misuse carries
 * `isOperational: false`: it is a bug in the caller, not a runtime condition.
 */
export class ConfigurationError extends BaseError<"invalid_configuration"> {
  constructor(message: string, context?: ErrorContext, isOperational = true) {
    super(message, { code: "invalid_configuration", context, isOperational })
  }
}

export class UnsupportedKeyError extends BaseError<"unsupported_key"> {
  constructor(keyType: string) {
    super(`Cannot hash a key of type ${keyType}`, {
      code: "unsupported_key",
      context: { keyType },
    })
  }
}

export class CapacityExceededError extends BaseError<"capacity_exceeded"> {
  constructor(requested: number, limit: number) {
    super(`Requested capacity ${requested} exceeds the limit of ${limit}`, {
      code: "capacity_exceeded",
      context: { requested, limit },
    })
  }
}

/**
 * An entry still had no slot after the table doubled the maximum number of
 * times in a row, typically because more than k keys share a base hash.
 */
export class PlacementFailedError extends BaseError<"placement_failed"> {
  constructor(growths: number, capacity: number) {
    super(`Could not place an entry after ${growths} consecutive doublings`, {
      code: "placement_failed",
      context: { growths, capacity },
    })
  }
}

export class InvariantViolationError extends BaseError<"invariant_violation"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "invariant_violation", context, isOperational: false })
  }
}
