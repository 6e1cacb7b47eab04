import { createPinoLogger, type Logger } from "@kvbridge/logger"
import { EnvBindingsSource } from "../../adapters/config/env-bindings-source"
import { ObjectSource } from "../../adapters/config/object-source"
import type { Clock } from "../../ports/clock"
import { kvConfigSchema, loadKvConfig } from "../config/load-kv-config"
import { KvStore } from "./kv-store"

export type OpenKvStoreOptions = {
  /** Applied over the env variables, e.g. `{ BINDING: "CACHE" }`. */
  overrides?: Record<string, unknown>
  /** Prefix of the env variables to read. Default: `"KV_"`. */
  prefix?: string
  /** Replaces the pino logger built from `LOG_LEVEL` / `LOG_PRETTY`. */
  logger?: Logger
  clock?: Clock
}

/**
 * Opens the namespace named by the `KV_BINDING` variable (default `"KV"`).
 *
 * @throws ConfigurationError when the variables do not validate.
 * @throws BindingError when the named binding is missing or not a namespace.
 */
export async function openKvStore(env: object, options: OpenKvStoreOptions = {}): Promise<KvStore> {
  const config = await loadKvConfig({
    schema: kvConfigSchema,
    sources: [
      new EnvBindingsSource(env, { ...(options.prefix !== undefined && { prefix: options.prefix }) }),
      new ObjectSource(options.overrides ?? {}),
    ],
  })

  const { BINDING, LOG_LEVEL, LOG_PRETTY, CACHE_TTL } = config.value
  const logger =
    options.logger ?? createPinoLogger({}, { level: LOG_LEVEL, prettify: LOG_PRETTY })

  logger.debug("kv config loaded", {
    binding: BINDING,
    bindingSource: config.explain("BINDING"),
    unknownKeys: config.unknownKeys(),
  })

  return KvStore.open(
    env,
    BINDING,
    { logger, ...(options.clock && { clock: options.clock }) },
    { ...(CACHE_TTL !== undefined && { cacheTtl: CACHE_TTL }) },
  )
}
