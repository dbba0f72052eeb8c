import type { KeyHasher } from "../../ports/key-hasher"
import { HashFamily } from "../hash-family"
import { defaultKeyHasher } from "../key-hasher"
import { mixToWord } from "../mix"

describe("HashFamily", () => {
  describe("construction", () => {
    it("derives one frozen seed per function", () => {
      const family = new HashFamily({ functionCount: 4, masterSeed: 0n })

      expect(family.k).toBe(4)
      expect(family.seeds).toHaveLength(4)
      expect(family.seeds[0]).toBe(0xe220a8397b1dcdafn)
      expect(Object.isFrozen(family.seeds)).toBe(true)
    })

    it("accepts a single function", () => {
      expect(new HashFamily({ functionCount: 1, masterSeed: 1 }).k).toBe(1)
    })

    it.each([0, -1, 2.5, Number.NaN])("rejects a function count of %d", (functionCount) => {
      expect(() => new HashFamily({ functionCount, masterSeed: 1n })).toThrow(
        expect.objectContaining({ code: "invalid_configuration", isOperational: true }),
      )
    })

    it("reduces bigint master seeds mod 2^64", () => {
      expect(new HashFamily({ functionCount: 2, masterSeed: (1n << 64n) + 9n }).masterSeed).toBe(9n)
    })

    it.each([-1, 1.5, 2 ** 53])("rejects a numeric master seed of %d", (masterSeed) => {
      expect(() => new HashFamily({ functionCount: 2, masterSeed })).toThrow(
        `masterSeed must be a non-negative safe integer, got: ${masterSeed}`,
      )
    })

    it("draws a random master seed when none is given", () => {
      const a = new HashFamily({ functionCount: 2 })
      const b = new HashFamily({ functionCount: 2 })

      expect(a.masterSeed).not.toBe(b.masterSeed)
    })
  })

  describe("hash", () => {
    const family = new HashFamily({ functionCount: 3, masterSeed: 42n })

    it("mixes the key's base hash with the function's seed", () => {
      const base = defaultKeyHasher.hash("apple")

      family.seeds.forEach((seed, i) => {
        expect(family.hash(i, "apple")).toBe(mixToWord(base, seed))
      })
    })

    it("is reproducible across families with the same seed", () => {
      const twin = new HashFamily({ functionCount: 3, masterSeed: 42n })

      expect(twin.hash(2, "apple")).toBe(family.hash(2, "apple"))
    })

    it("differs between functions", () => {
      expect(family.hash(0, "apple")).not.toBe(family.hash(1, "apple"))
    })

    it.each([-1, 3, 0.5])("rejects function index %d as misuse", (index) => {
      expect(() => family.hash(index, "apple")).toThrow(
        expect.objectContaining({
          code: "invalid_configuration",
          isOperational: false,
          context: { index, functionCount: 3 },
        }),
      )
    })
  })

  describe("positions", () => {
    const family = new HashFamily({ functionCount: 3, masterSeed: 42n })

    it("reduces each hash modulo the capacity", () => {
      for (let i = 0; i < 3; i++) {
        expect(family.position(i, "pear", 13)).toBe(Number(family.hash(i, "pear") % 13n))
      }
    })

    it("lists every function's position in order", () => {
      const expected = [0, 1, 2].map((i) => family.position(i, "pear", 1000))

      expect(family.candidates("pear", 1000)).toStrictEqual(expected)
    })

    it("maps everything to slot 0 of a single-slot table", () => {
      expect(family.candidates("pear", 1)).toStrictEqual([0, 0, 0])
    })
  })

  describe("custom key hasher", () => {
    const caseInsensitive: KeyHasher<string> = {
      hash: (key) => defaultKeyHasher.hash(key.toLowerCase()),
      equals: (a, b) => a.toLowerCase() === b.toLowerCase(),
    }

    it("hashes and compares through the supplied hasher", () => {
      const family = new HashFamily({ functionCount: 2, masterSeed: 5n, keyHasher: caseInsensitive })

      expect(family.hash(0, "ABC")).toBe(family.hash(0, "abc"))
      expect(family.equals("ABC", "abc")).toBe(true)
    })
  })
})
