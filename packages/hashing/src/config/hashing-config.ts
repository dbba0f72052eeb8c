import { type ConfigSource, EnvSource, type IConfig, loadConfig } from "@multiprobe/config"
import { logLevelNames } from "@multiprobe/logger"
import { z } from "zod"

export const ENV_PREFIX = "MULTIPROBE_"

const masterSeed = z
  .union([
    z.bigint(),
    z.number().int().nonnegative(),
    z.string().regex(/^(0x[0-9a-fA-F]+|[0-9]+)$/, "expected a decimal or 0x-prefixed hex integer"),
  ])
  .transform((seed) => BigInt.asUintN(64, BigInt(seed)))

const flag = z.union([z.boolean(), z.stringbool()])

export const hashingConfigSchema = z.object({
  HASH_FUNCTION_COUNT: z.coerce.number().int().min(1).default(3),
  HASH_MASTER_SEED: masterSeed.optional(),
  CUCKOO_INITIAL_CAPACITY: z.coerce.number().int().min(0).default(16),
  CUCKOO_MAX_DISPLACEMENTS: z.coerce.number().int().min(0).default(500),
  REPLICATED_INITIAL_BUCKETS: z.coerce.number().int().min(0).default(16),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type HashingConfig = z.infer<typeof hashingConfigSchema>

/**
 * Loads {@link HashingConfig}. Without sources, reads `MULTIPROBE_*`
 * environment variables.
 */
export function loadHashingConfig(sources?: ConfigSource[]): Promise<IConfig<HashingConfig>> {
  return loadConfig({
    schema: hashingConfigSchema,
    sources: sources ?? [new EnvSource({ prefix: ENV_PREFIX })],
  })
}
