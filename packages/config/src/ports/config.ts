/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ CUCKOO_MAX_DISPLACEMENTS: z.coerce.number().default(500) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("CUCKOO_MAX_DISPLACEMENTS")     // 500
 * config.explain("CUCKOO_MAX_DISPLACEMENTS") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that supplied the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct provenance labels, in first-use order. */
  sourcesUsed(): string[]

  /**
   * Keys some source provided that the schema does not know about. Usually a
   * typo such as `CUCKOO_MAX_DISPLACEMENT`.
   */
  unknownKeys(): string[]
}
