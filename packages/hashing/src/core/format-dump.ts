import { inspect } from "node:util"
import type { CuckooTableDump, DumpEntry, ReplicatedTableDump, TableDump } from "../ports/table-dump"

export type FormatDumpOptions = {
  /**
   * Include one line per slot or bucket.
   *
   * @default true
   */
  detailed?: boolean
}

/**
 * Renders a table dump as plain text, one fact per line.
 *
 * @example
 * ```
 * CuckooTable
 * capacity: 4
 * size: 1
 * load factor: 0.25
 * hash functions: 2
 * max displacements: 500
 * slots:
 *   0: empty
 *   1: 'a' => 1 (candidates: 1, 3)
 * ```
 */
export function formatDump<K, V>(dump: TableDump<K, V>, options: FormatDumpOptions = {}): string {
  const detailed = options.detailed ?? true
  const lines = dump.kind === "cuckoo" ? cuckooLines(dump, detailed) : replicatedLines(dump, detailed)

  return lines.join("\n")
}

function cuckooLines<K, V>(dump: CuckooTableDump<K, V>, detailed: boolean): string[] {
  const lines = [
    "CuckooTable",
    `capacity: ${dump.capacity}`,
    `size: ${dump.size}`,
    `load factor: ${dump.loadFactor}`,
    `hash functions: ${dump.functionCount}`,
    `max displacements: ${dump.maxDisplacements}`,
  ]

  if (!detailed) return lines

  lines.push("slots:")

  for (const slot of dump.slots) {
    const occupant = slot.occupant === undefined ? "empty" : formatEntry(slot.occupant)
    lines.push(`  ${slot.index}: ${occupant}`)
  }

  return lines
}

function replicatedLines<K, V>(dump: ReplicatedTableDump<K, V>, detailed: boolean): string[] {
  const lines = [
    "ReplicatedTable",
    `buckets: ${dump.bucketCount}`,
    `size: ${dump.size}`,
    `copies: ${dump.copies}`,
    `load factor: ${dump.loadFactor}`,
    `hash functions: ${dump.functionCount}`,
  ]

  if (!detailed) return lines

  lines.push("chains:")

  for (const bucket of dump.buckets) {
    const chain = bucket.chain.length === 0 ? "empty" : bucket.chain.map(formatEntry).join(" -> ")
    lines.push(`  ${bucket.index}: ${chain}`)
  }

  return lines
}

function formatEntry<K, V>(entry: DumpEntry<K, V>): string {
  const candidates = entry.candidates.join(", ")

  return `${formatValue(entry.key)} => ${formatValue(entry.value)} (candidates: ${candidates})`
}

function formatValue(value: unknown): string {
  return inspect(value, { breakLength: Number.POSITIVE_INFINITY, depth: 2 })
}
