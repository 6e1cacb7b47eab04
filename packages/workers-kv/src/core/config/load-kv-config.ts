import { logLevelNames } from "@kvbridge/logger"
import { z } from "zod"
import type { ConfigSource } from "../../ports/config-source"
import { ConfigurationError } from "../errors/kv-errors"
import { KvConfig } from "./kv-config"

export const kvConfigSchema = z.object({
  /** Name of the namespace binding in the Worker env. */
  BINDING: z.string().min(1).default("KV"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  /** Default edge cache TTL for reads, seconds. */
  CACHE_TTL: z.coerce.number().int().positive().optional(),
})

export type KvSettings = z.output<typeof kvConfigSchema>

export type LoadKvConfigOptions<T extends Record<string, unknown>> = {
  schema: z.ZodType<T>
  sources: readonly ConfigSource[]
}

/**
 * Merges `sources` in order (later wins), then validates the result.
 *
 * @throws ConfigurationError with the prettified validation report.
 */
export async function loadKvConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadKvConfigOptions<T>): Promise<KvConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw ConfigurationError.invalidConfig(result.error)
  }

  return new KvConfig<T>(result.data, provenance, new Set(Object.keys(merged)))
}
