import { createNullLogger, type Logger } from "@multiprobe/logger"
import {
  CapacityExceededError,
  ConfigurationError,
  InvariantViolationError,
  PlacementFailedError,
} from "../../core/errors"
import type { HashFamily } from "../../core/hash-family"
import { assertInteger, clampToInteger } from "../../core/validation"
import type { HashTable } from "../../ports/hash-table"
import type { CuckooTableDump } from "../../ports/table-dump"

export type CuckooTableOptions = {
  /**
   * Slot count to start with. Values below 2 are raised to 2.
   *
   * @default 16
   */
  initialCapacity?: number

  /**
   * Evictions one insert may perform before the table doubles and retries.
   *
   * @default 500
   */
  maxDisplacements?: number

  /** Receives a debug entry on every growth. */
  logger?: Logger

  /** Added to log entries as `table`. */
  name?: string
}

export type GrowthReason = "load_factor" | "displacement_limit" | "manual"

type Entry<K, V> = { key: K; value: V }

/** One swap of an eviction walk: `evicted` was in `index` before the swap. */
type Swap<K, V> = { index: number; evicted: Entry<K, V> }

/**
 * Cuckoo hashing over a shared {@link HashFamily}: every key lives in one of
 * its k candidate slots, so a lookup reads at most k slots.
 *
 * Inserts into a full neighborhood evict occupants to their alternate slots,
 * up to `maxDisplacements` times, after which the table doubles.
 */
export class CuckooTable<K, V> implements HashTable<K, V> {
  static readonly DEFAULT_CAPACITY = 16
  static readonly DEFAULT_MAX_DISPLACEMENTS = 500
  static readonly MIN_CAPACITY = 2
  static readonly CAPACITY_MAX = 2 ** 30

  /** Above this load an insert grows the table first. */
  static readonly MAX_LOAD_FACTOR = 0.5

  /** Consecutive doublings one entry may trigger before its insert fails. */
  static readonly MAX_GROWTH_RETRIES = 8

  private readonly family: HashFamily<K>
  private readonly displacementLimit: number
  private readonly logger: Logger

  private slots: (Entry<K, V> | undefined)[]
  private count = 0

  constructor(family: HashFamily<K> | undefined, options: CuckooTableOptions = {}) {
    if (family === undefined) {
      throw new ConfigurationError("CuckooTable requires a hash family")
    }

    if (family.k < 2) {
      throw new ConfigurationError(
        `CuckooTable requires at least 2 hash functions, got: ${family.k}`,
        { functionCount: family.k },
      )
    }

    const initialCapacity = options.initialCapacity ?? CuckooTable.DEFAULT_CAPACITY
    const maxDisplacements = options.maxDisplacements ?? CuckooTable.DEFAULT_MAX_DISPLACEMENTS

    assertInteger("initialCapacity", initialCapacity, 0)
    assertInteger("maxDisplacements", maxDisplacements, 0)
    assertWithinLimit(initialCapacity)

    this.family = family
    this.displacementLimit = maxDisplacements
    this.slots = emptySlots<Entry<K, V>>(Math.max(CuckooTable.MIN_CAPACITY, initialCapacity))
    this.logger = (options.logger ?? createNullLogger()).child({
      component: "cuckoo-table",
      ...(options.name !== undefined ? { table: options.name } : {}),
    })
  }

  /**
   * Inserts or updates `key`. When the entry cannot be placed, throws
   * {@link PlacementFailedError} or {@link CapacityExceededError} and leaves
   * the table as it was before the call.
   */
  insert(key: K, value: V): boolean {
    return this.atomically(() => {
      if (this.loadFactor() > CuckooTable.MAX_LOAD_FACTOR) {
        this.grow("load_factor")
      }

      const existing = this.slots[this.locate(key)]

      if (existing !== undefined) {
        existing.value = value
        return false
      }

      this.place({ key, value })
      return true
    })
  }

  find(key: K): V | undefined {
    return this.slots[this.locate(key)]?.value
  }

  contains(key: K): boolean {
    return this.locate(key) !== -1
  }

  erase(key: K): boolean {
    const index = this.locate(key)

    if (index === -1) return false

    this.slots[index] = undefined
    this.count--
    return true
  }

  /**
   * Rebuilds at `capacity`, truncated to an integer and raised to 2. A
   * capacity too small for the contents grows again while rebuilding.
   */
  resize(capacity: number): void {
    const target = clampToInteger(capacity, CuckooTable.MIN_CAPACITY)

    assertWithinLimit(target)

    const from = this.slots.length

    this.atomically(() => this.rebuild(target))
    this.logGrowth("manual", from)
  }

  clear(): void {
    this.slots.fill(undefined)
    this.count = 0
  }

  size(): number {
    return this.count
  }

  capacity(): number {
    return this.slots.length
  }

  loadFactor(): number {
    return this.count / this.slots.length
  }

  functionCount(): number {
    return this.family.k
  }

  maxDisplacements(): number {
    return this.displacementLimit
  }

  *entries(): IterableIterator<[K, V]> {
    for (const slot of this.slots) {
      if (slot !== undefined) yield [slot.key, slot.value]
    }
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) yield key
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) yield value
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  dump(): CuckooTableDump<K, V> {
    const capacity = this.slots.length

    return {
      kind: "cuckoo",
      capacity,
      size: this.count,
      loadFactor: this.loadFactor(),
      functionCount: this.family.k,
      maxDisplacements: this.displacementLimit,
      slots: this.slots.map((slot, index) =>
        slot === undefined
          ? { index }
          : {
              index,
              occupant: {
                key: slot.key,
                value: slot.value,
                candidates: this.family.candidates(slot.key, capacity),
              },
            },
      ),
    }
  }

  /** Index of the slot holding `key`, or -1. */
  private locate(key: K): number {
    for (const index of this.family.candidates(key, this.slots.length)) {
      const slot = this.slots[index]

      if (slot !== undefined && this.family.equals(slot.key, key)) return index
    }

    return -1
  }

  /**
   * Runs `mutation`, putting back the slot array and count it started from
   * when it throws. Growth swaps in a fresh array and a failed walk rewinds
   * itself, so the starting array is intact at that point.
   */
  private atomically<T>(mutation: () => T): T {
    const slots = this.slots
    const count = this.count

    try {
      return mutation()
    } catch (err) {
      this.slots = slots
      this.count = count
      throw err
    }
  }

  /**
   * Places an entry whose key is absent, doubling the table whenever the
   * eviction walk gives up, at most {@link CuckooTable.MAX_GROWTH_RETRIES}
   * times in a row.
   */
  private place(entry: Entry<K, V>): void {
    for (let growths = 0; ; growths++) {
      if (this.displace(entry)) {
        this.count++
        return
      }

      if (growths === CuckooTable.MAX_GROWTH_RETRIES) {
        throw new PlacementFailedError(growths, this.slots.length)
      }

      this.grow("displacement_limit")
    }
  }

  /**
   * Runs the bounded eviction walk for `entry`. Returns false when the walk
   * gives up, after undoing every swap it made.
   */
  private displace(entry: Entry<K, V>): boolean {
    const capacity = this.slots.length

    if (this.claimFreeCandidate(entry, capacity)) return true

    const swaps: Swap<K, V>[] = []
    let current = entry
    let which = 0

    for (let step = 0; step < this.displacementLimit; step++) {
      which = (which + 1) % this.family.k

      const index = this.family.position(which, current.key, capacity)
      const evicted = this.slots[index]

      this.slots[index] = current

      if (evicted === undefined) return true

      swaps.push({ index, evicted })
      current = evicted

      if (this.claimFreeCandidate(current, capacity)) return true
    }

    for (const { index, evicted } of swaps.reverse()) {
      this.slots[index] = evicted
    }

    return false
  }

  private claimFreeCandidate(entry: Entry<K, V>, capacity: number): boolean {
    for (const index of this.family.candidates(entry.key, capacity)) {
      if (this.slots[index] === undefined) {
        this.slots[index] = entry
        return true
      }
    }

    return false
  }

  private grow(reason: GrowthReason): void {
    const from = this.slots.length
    const to = from * 2

    assertWithinLimit(to)

    this.rebuild(to)
    this.logGrowth(reason, from)
  }

  /**
   * Reinserts every entry into `capacity` fresh slots. A nested growth while
   * reinserting is allowed; the entry count must survive either way.
   */
  private rebuild(capacity: number): void {
    const entries = this.slots.filter((slot): slot is Entry<K, V> => slot !== undefined)
    const before = this.count

    this.slots = emptySlots<Entry<K, V>>(capacity)
    this.count = 0

    for (const entry of entries) {
      this.place(entry)
    }

    if (this.count !== before) {
      throw new InvariantViolationError("Entry count changed while rebuilding the table", {
        before,
        after: this.count,
        capacity: this.slots.length,
      })
    }
  }

  private logGrowth(reason: GrowthReason, fromCapacity: number): void {
    this.logger.debug("cuckoo table resized", {
      reason,
      fromCapacity,
      toCapacity: this.slots.length,
      size: this.count,
    })
  }
}

function emptySlots<T>(capacity: number): (T | undefined)[] {
  return new Array<T | undefined>(capacity).fill(undefined)
}

function assertWithinLimit(capacity: number): void {
  if (capacity > CuckooTable.CAPACITY_MAX) {
    throw new CapacityExceededError(capacity, CuckooTable.CAPACITY_MAX)
  }
}
