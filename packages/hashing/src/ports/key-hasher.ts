/**
 * A key that supplies its own hash and equality, for composite keys.
 * Equal keys must return equal hash codes.
 */
export interface Hashable {
  hashCode(): bigint | number
  equals(other: unknown): boolean
}

/** Keys the default key hasher accepts. */
export type Key = string | number | bigint | boolean | Hashable

/**
 * Produces the single 64-bit base hash every function of a family mixes
 * with its own seed, and decides when two keys are the same key.
 */
export interface KeyHasher<K> {
  hash(key: K): bigint
  equals(a: K, b: K): boolean
}
