export type DumpEntry<K, V> = {
  key: K
  value: V

  /** The key's candidate positions under the table's current capacity, by function index. */
  candidates: number[]
}

export type CuckooSlotDump<K, V> = {
  index: number
  occupant?: DumpEntry<K, V>
}

export type CuckooTableDump<K, V> = {
  kind: "cuckoo"
  capacity: number
  size: number
  loadFactor: number
  functionCount: number
  maxDisplacements: number
  slots: CuckooSlotDump<K, V>[]
}

export type ReplicatedBucketDump<K, V> = {
  index: number
  chain: DumpEntry<K, V>[]
}

export type ReplicatedTableDump<K, V> = {
  kind: "replicated"
  bucketCount: number
  size: number
  copies: number
  loadFactor: number
  functionCount: number
  buckets: ReplicatedBucketDump<K, V>[]
}

export type TableDump<K, V> = CuckooTableDump<K, V> | ReplicatedTableDump<K, V>
