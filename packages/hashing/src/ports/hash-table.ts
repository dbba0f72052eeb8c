import type { TableDump } from "./table-dump"

/**
 * A map from keys to values placed by a shared hash family.
 *
 * "Not found" is never an error: lookups return `undefined` and removals
 * return `false`.
 */
export interface HashTable<K, V> extends Iterable<[K, V]> {
  /**
   * Inserts or updates. Returns true when the key was not present before.
   */
  insert(key: K, value: V): boolean

  find(key: K): V | undefined

  /**
   * Returns true when the key was present and has been removed.
   */
  erase(key: K): boolean

  contains(key: K): boolean

  clear(): void

  /**
   * Rebuilds the table at `capacity`, keeping every entry. The capacity is
   * truncated to an integer and raised to the table's minimum, so any
   * number is accepted.
   */
  resize(capacity: number): void

  size(): number
  capacity(): number
  loadFactor(): number

  entries(): IterableIterator<[K, V]>
  keys(): IterableIterator<K>
  values(): IterableIterator<V>

  dump(): TableDump<K, V>
}
