export { CuckooTable, type CuckooTableOptions, type GrowthReason } from "./adapters/cuckoo/cuckoo-table"
export { ReplicatedTable, type ReplicatedTableOptions } from "./adapters/replicated/replicated-table"
export {
  createCuckooTable,
  createHashFamily,
  createHashingLogger,
  createReplicatedTable,
  type TableDeps,
} from "./config/create-hashing"
export {
  ENV_PREFIX,
  type HashingConfig,
  hashingConfigSchema,
  loadHashingConfig,
} from "./config/hashing-config"
export {
  CapacityExceededError,
  ConfigurationError,
  InvariantViolationError,
  PlacementFailedError,
  UnsupportedKeyError,
} from "./core/errors"
export { type FormatDumpOptions, formatDump } from "./core/format-dump"
export { HashFamily, type HashFamilyOptions } from "./core/hash-family"
export { defaultKeyHasher, fnv1a64, isHashable } from "./core/key-hasher"
export { deriveSeeds, GOLDEN_GAMMA, mixToWord, splitmix64 } from "./core/mix"
export type { HashTable } from "./ports/hash-table"
export type { Hashable, Key, KeyHasher } from "./ports/key-hasher"
export type {
  CuckooSlotDump,
  CuckooTableDump,
  DumpEntry,
  ReplicatedBucketDump,
  ReplicatedTableDump,
  TableDump,
} from "./ports/table-dump"
