import type { Hashable, KeyHasher } from "../ports/key-hasher"
import { UnsupportedKeyError } from "./errors"
import { mixToWord, toWord } from "./mix"

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n
const FNV_PRIME = 0x100000001b3n

// Folded in per type so 1, 1n, "1" and true hash independently.
const STRING_TAG = 0x73n
const NUMBER_TAG = 0x6en
const FLOAT_TAG = 0x66n
const BIGINT_TAG = 0x62n
const BOOLEAN_TAG = 0x74n

const CANONICAL_NAN = 0x7ff8000000000000n

const encoder = new TextEncoder()
const float64 = new DataView(new ArrayBuffer(8))

/** 64-bit FNV-1a. */
export function fnv1a64(bytes: Uint8Array): bigint {
  let hash = FNV_OFFSET_BASIS

  for (const byte of bytes) {
    hash = toWord((hash ^ BigInt(byte)) * FNV_PRIME)
  }

  return hash
}

export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === "object" &&
    value !== null &&
    "hashCode" in value &&
    typeof value.hashCode === "function" &&
    "equals" in value &&
    typeof value.equals === "function"
  )
}

function floatBits(value: number): bigint {
  if (Number.isNaN(value)) return CANONICAL_NAN

  float64.setFloat64(0, value)
  return float64.getBigUint64(0)
}

// -0 is a safe integer and hashes as 0.
function hashNumber(value: number): bigint {
  return Number.isSafeInteger(value)
    ? tagged(NUMBER_TAG, toWord(BigInt(value)))
    : tagged(FLOAT_TAG, floatBits(value))
}

function tagged(tag: bigint, word: bigint): bigint {
  return mixToWord(word, tag)
}

function describeType(key: unknown): string {
  if (key === null) return "null"
  if (typeof key === "object") return key.constructor?.name ?? "object"
  return typeof key
}

/**
 * Hashes strings, numbers, bigints, booleans and {@link Hashable} keys.
 *
 * Primitives compare with SameValueZero, so `-0` and `0` are one key and so
 * is every NaN. Anything else throws {@link UnsupportedKeyError}.
 */
export const defaultKeyHasher: KeyHasher<unknown> = {
  hash(key: unknown): bigint {
    switch (typeof key) {
      case "string":
        return tagged(STRING_TAG, fnv1a64(encoder.encode(key)))
      case "number":
        return hashNumber(key)
      case "bigint":
        return tagged(BIGINT_TAG, toWord(key))
      case "boolean":
        return tagged(BOOLEAN_TAG, key ? 1n : 0n)
    }

    if (isHashable(key)) {
      const code = key.hashCode()
      if (typeof code === "bigint") return toWord(code)

      return Number.isSafeInteger(code) ? toWord(BigInt(code)) : floatBits(code)
    }

    throw new UnsupportedKeyError(describeType(key))
  },

  equals(a: unknown, b: unknown): boolean {
    if (isHashable(a)) return isHashable(b) && a.equals(b)

    return a === b || (Number.isNaN(a) && Number.isNaN(b))
  },
}
