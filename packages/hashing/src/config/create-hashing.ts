import { createLogger, type Logger } from "@multiprobe/logger"
import { CuckooTable } from "../adapters/cuckoo/cuckoo-table"
import { ReplicatedTable } from "../adapters/replicated/replicated-table"
import { HashFamily } from "../core/hash-family"
import type { Key, KeyHasher } from "../ports/key-hasher"
import type { HashingConfig } from "./hashing-config"

export type TableDeps = {
  logger?: Logger
  name?: string
}

export function createHashingLogger(config: HashingConfig): Logger {
  return createLogger({
    level: config.LOG_LEVEL,
    prettify: config.LOG_PRETTY,
    context: { service: "multiprobe" },
  })
}

export function createHashFamily<K = Key>(
  config: HashingConfig,
  keyHasher?: KeyHasher<K>,
): HashFamily<K> {
  return new HashFamily<K>({
    functionCount: config.HASH_FUNCTION_COUNT,
    ...(config.HASH_MASTER_SEED !== undefined ? { masterSeed: config.HASH_MASTER_SEED } : {}),
    ...(keyHasher !== undefined ? { keyHasher } : {}),
  })
}

export function createCuckooTable<K, V>(
  family: HashFamily<K>,
  config: HashingConfig,
  deps: TableDeps = {},
): CuckooTable<K, V> {
  return new CuckooTable<K, V>(family, {
    ...deps,
    initialCapacity: config.CUCKOO_INITIAL_CAPACITY,
    maxDisplacements: config.CUCKOO_MAX_DISPLACEMENTS,
  })
}

export function createReplicatedTable<K, V>(
  family: HashFamily<K>,
  config: HashingConfig,
  deps: TableDeps = {},
): ReplicatedTable<K, V> {
  return new ReplicatedTable<K, V>(family, {
    ...deps,
    initialBuckets: config.REPLICATED_INITIAL_BUCKETS,
  })
}
