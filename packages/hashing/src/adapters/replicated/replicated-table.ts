import { createNullLogger, type Logger } from "@multiprobe/logger"
import { CapacityExceededError, ConfigurationError, InvariantViolationError } from "../../core/errors"
import type { HashFamily } from "../../core/hash-family"
import { assertInteger, clampToInteger } from "../../core/validation"
import type { HashTable } from "../../ports/hash-table"
import type { ReplicatedTableDump } from "../../ports/table-dump"

export type ReplicatedTableOptions = {
  /**
   * Values below 1 are raised to 1.
   *
   * @default 16
   */
  initialBuckets?: number

  logger?: Logger

  /** Added to log entries as `table`. */
  name?: string
}

type Entry<K, V> = { key: K; value: V }

/**
 * Chained table that keeps a copy of every entry in each of its k candidate
 * buckets. Lookups stop at the first candidate bucket holding the key.
 */
export class ReplicatedTable<K, V> implements HashTable<K, V> {
  static readonly DEFAULT_BUCKETS = 16
  static readonly MIN_BUCKETS = 1
  static readonly MIN_FUNCTION_COUNT = 3
  static readonly CAPACITY_MAX = 2 ** 30

  /** Above this load an insert doubles the bucket count first. */
  static readonly MAX_LOAD_FACTOR = 0.75

  private readonly family: HashFamily<K>
  private readonly logger: Logger

  private buckets: Entry<K, V>[][]
  private count = 0

  constructor(family: HashFamily<K> | undefined, options: ReplicatedTableOptions = {}) {
    if (family === undefined) {
      throw new ConfigurationError("ReplicatedTable requires a hash family")
    }

    if (family.k < ReplicatedTable.MIN_FUNCTION_COUNT) {
      throw new ConfigurationError(
        `ReplicatedTable requires at least ${ReplicatedTable.MIN_FUNCTION_COUNT} hash functions, got: ${family.k}`,
        { functionCount: family.k },
      )
    }

    const initialBuckets = options.initialBuckets ?? ReplicatedTable.DEFAULT_BUCKETS

    assertInteger("initialBuckets", initialBuckets, 0)

    this.family = family
    this.buckets = emptyBuckets<K, V>(Math.max(ReplicatedTable.MIN_BUCKETS, initialBuckets))
    this.logger = (options.logger ?? createNullLogger()).child({
      component: "replicated-table",
      ...(options.name !== undefined ? { table: options.name } : {}),
    })
  }

  insert(key: K, value: V): boolean {
    if (this.loadFactor() > ReplicatedTable.MAX_LOAD_FACTOR) {
      this.rehash(this.buckets.length * 2, "load_factor")
    }

    let added = false

    for (const chain of this.candidateChains(key)) {
      const copy = chain.find((entry) => this.family.equals(entry.key, key))

      if (copy !== undefined) {
        copy.value = value
      } else {
        chain.push({ key, value })
        added = true
      }
    }

    if (added) this.count++
    return added
  }

  find(key: K): V | undefined {
    return this.lookup(key)?.value
  }

  contains(key: K): boolean {
    return this.lookup(key) !== undefined
  }

  /**
   * Returns the value stored under `key`, first inserting `create()` when the
   * key is absent.
   */
  ensure(key: K, create: () => V): V {
    const entry = this.lookup(key)

    if (entry !== undefined) return entry.value

    const value = create()
    this.insert(key, value)
    return value
  }

  erase(key: K): boolean {
    let removed = false

    for (const chain of this.candidateChains(key)) {
      const index = chain.findIndex((entry) => this.family.equals(entry.key, key))

      if (index !== -1) {
        chain.splice(index, 1)
        removed = true
      }
    }

    if (removed) this.count--
    return removed
  }

  /** Redistributes every key over `bucketCount` buckets, truncated and raised to 1. */
  resize(bucketCount: number): void {
    this.rehash(clampToInteger(bucketCount, ReplicatedTable.MIN_BUCKETS), "manual")
  }

  clear(): void {
    this.buckets = emptyBuckets<K, V>(this.buckets.length)
    this.count = 0
  }

  size(): number {
    return this.count
  }

  capacity(): number {
    return this.buckets.length
  }

  loadFactor(): number {
    return this.count / this.buckets.length
  }

  functionCount(): number {
    return this.family.k
  }

  /** Physical copies across all chains. */
  copies(): number {
    return this.buckets.reduce((total, chain) => total + chain.length, 0)
  }

  *entries(): IterableIterator<[K, V]> {
    for (const entry of this.primaryCopies()) yield [entry.key, entry.value]
  }

  *keys(): IterableIterator<K> {
    for (const entry of this.primaryCopies()) yield entry.key
  }

  *values(): IterableIterator<V> {
    for (const entry of this.primaryCopies()) yield entry.value
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  dump(): ReplicatedTableDump<K, V> {
    const bucketCount = this.buckets.length

    return {
      kind: "replicated",
      bucketCount,
      size: this.count,
      copies: this.copies(),
      loadFactor: this.loadFactor(),
      functionCount: this.family.k,
      buckets: this.buckets.map((chain, index) => ({
        index,
        chain: chain.map((entry) => ({
          key: entry.key,
          value: entry.value,
          candidates: this.family.candidates(entry.key, bucketCount),
        })),
      })),
    }
  }

  private lookup(key: K): Entry<K, V> | undefined {
    for (const chain of this.candidateChains(key)) {
      const copy = chain.find((entry) => this.family.equals(entry.key, key))

      if (copy !== undefined) return copy
    }

    return undefined
  }

  /**
   * The distinct chains `key` maps to, in function order. Two functions
   * landing on one bucket share a single copy.
   */
  private candidateChains(key: K): Entry<K, V>[][] {
    const indexes = new Set(this.family.candidates(key, this.buckets.length))

    return [...indexes].map((index) => this.chainAt(index))
  }

  private chainAt(index: number): Entry<K, V>[] {
    const chain = this.buckets[index]

    if (chain === undefined) {
      throw new InvariantViolationError(`Bucket ${index} is outside the table`, {
        index,
        bucketCount: this.buckets.length,
      })
    }

    return chain
  }

  /**
   * One copy per distinct key: the one in the bucket of the key's first
   * hash function.
   */
  private *primaryCopies(): IterableIterator<Entry<K, V>> {
    const bucketCount = this.buckets.length

    for (const [index, chain] of this.buckets.entries()) {
      for (const entry of chain) {
        if (this.family.position(0, entry.key, bucketCount) === index) yield entry
      }
    }
  }

  private rehash(bucketCount: number, reason: "load_factor" | "manual"): void {
    if (bucketCount > ReplicatedTable.CAPACITY_MAX) {
      throw new CapacityExceededError(bucketCount, ReplicatedTable.CAPACITY_MAX)
    }

    const entries = [...this.primaryCopies()]
    const before = this.count
    const fromCapacity = this.buckets.length

    this.buckets = emptyBuckets<K, V>(bucketCount)
    this.count = 0

    for (const { key, value } of entries) {
      for (const chain of this.candidateChains(key)) chain.push({ key, value })
      this.count++
    }

    if (this.count !== before) {
      throw new InvariantViolationError("Entry count changed while rehashing the table", {
        before,
        after: this.count,
        bucketCount,
      })
    }

    this.logger.debug("replicated table rehashed", {
      reason,
      fromCapacity,
      toCapacity: bucketCount,
      size: this.count,
    })
  }
}

function emptyBuckets<K, V>(count: number): Entry<K, V>[][] {
  return Array.from({ length: count }, () => [])
}
