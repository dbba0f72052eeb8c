import { ConfigurationError } from "./errors"

export function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got: ${value}`, {
      [name]: value,
    })
  }
}

/** Truncates `value` and raises it to `min`. NaN becomes `min`. */
export function clampToInteger(value: number, min: number): number {
  const whole = Math.trunc(value)

  return Number.isNaN(whole) ? min : Math.max(min, whole)
}
