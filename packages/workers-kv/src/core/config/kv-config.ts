/**
 * Validated configuration together with where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadKvConfig({
 *   schema: kvConfigSchema,
 *   sources: [new EnvBindingsSource(env)],
 * })
 *
 * config.value.BINDING      // "SESSIONS"
 * config.explain("BINDING") // "env"
 * config.explain("LOG_LEVEL") // "default"
 * ```
 */
export class KvConfig<T extends Record<string, unknown>> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  /** Name of the source that supplied `key`, or `"default"`. */
  explain(key: keyof T & string): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  /**
   * Keys that some source provided but the schema does not define.
   * Usually a typo or a stale variable.
   */
  unknownKeys(): string[] {
    const known = new Set(Object.keys(this.data))

    return [...this.mergedKeys].filter((key) => !known.has(key))
  }
}
