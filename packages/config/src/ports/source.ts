/**
 * Somewhere raw configuration values come from: the process environment, a
 * dotenv file, or in-memory overrides.
 *
 * Sources only load. Coercion (e.g. `"500"` to `500`) and validation happen
 * in the zod schema handed to `loadConfig`.
 */
export interface ConfigSource {
  /** Provenance label reported by `Config.explain()`, e.g. `"dotenv:.env"` */
  readonly name: string

  /**
   * Returns a fresh object on every call. A key mapped to `undefined` counts
   * as "not provided" and never overrides an earlier source.
   */
  load(): Promise<Record<string, unknown>>
}
