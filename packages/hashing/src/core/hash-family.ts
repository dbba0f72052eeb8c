import { randomBytes } from "node:crypto"
import type { Key, KeyHasher } from "../ports/key-hasher"
import { ConfigurationError } from "./errors"
import { defaultKeyHasher } from "./key-hasher"
import { deriveSeeds, mixToWord, toWord } from "./mix"
import { assertInteger } from "./validation"

export type HashFamilyOptions<K> = {
  /** Number of hash functions, k. */
  functionCount: number

  /**
   * Reduced mod 2^64. Omit it for a seed drawn from `node:crypto`; pass one
   * for reproducible placement.
   */
  masterSeed?: bigint | number

  /** @default defaultKeyHasher */
  keyHasher?: KeyHasher<K>
}

/**
 * k independent 64-bit hash functions derived from one master seed.
 *
 * A family is immutable. Tables hold it by reference and several tables may
 * share one.
 */
export class HashFamily<K = Key> {
  readonly k: number
  readonly masterSeed: bigint
  readonly seeds: readonly bigint[]

  private readonly keyHasher: KeyHasher<K>

  constructor(options: HashFamilyOptions<K>) {
    assertInteger("functionCount", options.functionCount, 1)

    this.k = options.functionCount
    this.masterSeed = resolveMasterSeed(options.masterSeed)
    this.seeds = Object.freeze(deriveSeeds(this.masterSeed, this.k))
    this.keyHasher = options.keyHasher ?? defaultKeyHasher
  }

  /**
   * The `i`-th function applied to `key`, an unsigned 64-bit word.
   */
  hash(i: number, key: K): bigint {
    return mixToWord(this.keyHasher.hash(key), this.seedAt(i))
  }

  position(i: number, key: K, capacity: number): number {
    return Number(this.hash(i, key) % BigInt(capacity))
  }

  /**
   * Every function's position for `key`, in function order. Positions may
   * repeat.
   */
  candidates(key: K, capacity: number): number[] {
    const base = this.keyHasher.hash(key)
    const modulus = BigInt(capacity)

    return this.seeds.map((seed) => Number(mixToWord(base, seed) % modulus))
  }

  equals(a: K, b: K): boolean {
    return this.keyHasher.equals(a, b)
  }

  private seedAt(i: number): bigint {
    const seed = Number.isInteger(i) ? this.seeds[i] : undefined

    if (seed === undefined) {
      throw new ConfigurationError(
        `Hash function index ${i} is out of range [0, ${this.k})`,
        { index: i, functionCount: this.k },
        false,
      )
    }

    return seed
  }
}

function resolveMasterSeed(seed: bigint | number | undefined): bigint {
  if (seed === undefined) return randomBytes(8).readBigUInt64LE(0)
  if (typeof seed === "bigint") return toWord(seed)

  if (!Number.isSafeInteger(seed) || seed < 0) {
    throw new ConfigurationError(`masterSeed must be a non-negative safe integer, got: ${seed}`, {
      masterSeed: seed,
    })
  }

  return BigInt(seed)
}
