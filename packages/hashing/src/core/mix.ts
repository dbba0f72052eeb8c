/** 2^64 / phi, the SplitMix64 increment. */
export const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n

export function toWord(value: bigint): bigint {
  return BigInt.asUintN(64, value)
}

/**
 * One SplitMix64 step: advances `x` by the golden gamma and scrambles it.
 * Input and output are unsigned 64-bit words.
 */
export function splitmix64(x: bigint): bigint {
  let z = toWord(x + GOLDEN_GAMMA)
  z = toWord((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n)
  z = toWord((z ^ (z >> 27n)) * 0x94d049bb133111ebn)
  return z ^ (z >> 31n)
}

/**
 * Folds a per-function seed into a base hash, boost-style, then finalizes
 * the combination with SplitMix64.
 */
export function mixToWord(base: bigint, seed: bigint): bigint {
  const a = toWord(base)
  const folded = toWord(seed + GOLDEN_GAMMA + (a << 6n) + (a >> 2n))

  return splitmix64(a ^ folded)
}

/**
 * Expands one master seed into `count` seeds:
 * `x = splitmix64(x + i)` for each index.
 */
export function deriveSeeds(masterSeed: bigint, count: number): bigint[] {
  const seeds: bigint[] = []
  let x = toWord(masterSeed)

  for (let i = 0; i < count; i++) {
    x = splitmix64(x + BigInt(i))
    seeds.push(x)
  }

  return seeds
}
