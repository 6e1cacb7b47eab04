import type { ConfigSource } from "../../ports/config-source"

export type EnvBindingsSourceOptions = {
  /**
   * Only variables starting with this prefix are read, and the prefix is
   * stripped from their names. Pass `""` to read every variable.
   * Default: `"KV_"`.
   */
  prefix?: string
}

/**
 * Reads plain-text variables from a Worker `env` object.
 *
 * @remarks
 * The env object also carries bindings (namespaces, queues, service stubs);
 * only string-valued entries are configuration, everything else is skipped.
 */
export class EnvBindingsSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string

  constructor(
    private readonly env: object,
    options: EnvBindingsSourceOptions = {},
  ) {
    this.prefix = options.prefix ?? "KV_"
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (typeof value !== "string" || !key.startsWith(this.prefix)) continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
