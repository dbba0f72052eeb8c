import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigValidationError, loadConfig } from "../load"

const schema = z.object({
  HASH_FUNCTION_COUNT: z.coerce.number().int().min(1).default(3),
  CUCKOO_MAX_DISPLACEMENTS: z.coerce.number().int().min(0).default(500),
})

describe("loadConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "multiprobe-load-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("coerces and validates values from a single source", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { HASH_FUNCTION_COUNT: "4", CUCKOO_MAX_DISPLACEMENTS: "50" } })],
    })

    expect(config.value).toEqual({ HASH_FUNCTION_COUNT: 4, CUCKOO_MAX_DISPLACEMENTS: 50 })
  })

  it("fills schema defaults and reports them as default", async () => {
    const config = await loadConfig({ schema, sources: [new ObjectSource({})] })

    expect(config.get("HASH_FUNCTION_COUNT")).toBe(3)
    expect(config.explain("HASH_FUNCTION_COUNT")).toBe("default")
  })

  it("lets later sources override earlier ones", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "HASH_FUNCTION_COUNT=2\nCUCKOO_MAX_DISPLACEMENTS=10")

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { HASH_FUNCTION_COUNT: "5" } }),
      ],
    })

    expect(config.get("HASH_FUNCTION_COUNT")).toBe(5)
    expect(config.explain("HASH_FUNCTION_COUNT")).toBe("env")
    expect(config.get("CUCKOO_MAX_DISPLACEMENTS")).toBe(10)
    expect(config.explain("CUCKOO_MAX_DISPLACEMENTS")).toBe("dotenv:.env")
  })

  it("does not let undefined values override", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ HASH_FUNCTION_COUNT: "6" }),
        new EnvSource({ env: { HASH_FUNCTION_COUNT: undefined } }),
      ],
    })

    expect(config.get("HASH_FUNCTION_COUNT")).toBe(6)
    expect(config.explain("HASH_FUNCTION_COUNT")).toBe("object:overrides")
  })

  it("skips a missing optional dotenv file", async () => {
    const config = await loadConfig({
      schema,
      sources: [new DotenvSource({ file: ".env.missing", required: false, cwd })],
    })

    expect(config.value).toEqual({ HASH_FUNCTION_COUNT: 3, CUCKOO_MAX_DISPLACEMENTS: 500 })
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ HASH_FUNCTION_CONT: "4" })],
    })

    expect(config.unknownKeys()).toEqual(["HASH_FUNCTION_CONT"])
  })

  it("throws ConfigValidationError listing the failing paths", async () => {
    const load = loadConfig({
      schema,
      sources: [new ObjectSource({ HASH_FUNCTION_COUNT: "0", CUCKOO_MAX_DISPLACEMENTS: "many" })],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(load).rejects.toMatchObject({
      code: "config_validation",
      context: {
        issues: [
          { path: "HASH_FUNCTION_COUNT", message: expect.any(String) },
          { path: "CUCKOO_MAX_DISPLACEMENTS", message: expect.any(String) },
        ],
      },
    })
  })
})
