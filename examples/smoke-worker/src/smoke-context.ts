import { createPinoLogger, type Logger } from "@kvbridge/logger"
import {
  type Clock,
  EnvBindingsSource,
  type KvStore,
  kvConfigSchema,
  loadKvConfig,
  openKvStore,
} from "@kvbridge/workers-kv"

export type SmokeContext = {
  logger: Logger
  store: KvStore
}

export type SmokeContextDeps = {
  logger?: Logger
  clock?: Clock
}

/**
 * Builds the logger and store for one Worker env. The logger comes from the
 * `KV_LOG_*` variables unless one is injected.
 */
export async function createSmokeContext(
  env: object,
  deps: SmokeContextDeps = {},
): Promise<SmokeContext> {
  let logger = deps.logger
  if (!logger) {
    const config = await loadKvConfig({
      schema: kvConfigSchema,
      sources: [new EnvBindingsSource(env)],
    })
    logger = createPinoLogger(
      {},
      { level: config.value.LOG_LEVEL, prettify: config.value.LOG_PRETTY },
    )
  }

  const store = await openKvStore(env, {
    logger,
    ...(deps.clock && { clock: deps.clock }),
  })

  return { logger, store }
}

/**
 * One context per env object: the host hands every request of an isolate the
 * same env. A failed build is dropped so the next request tries again.
 */
export class SmokeContextCache {
  private readonly contexts = new WeakMap<object, Promise<SmokeContext>>()

  constructor(private readonly deps: SmokeContextDeps = {}) {}

  get(env: object): Promise<SmokeContext> {
    const cached = this.contexts.get(env)
    if (cached) return cached

    const context = createSmokeContext(env, this.deps)
    this.contexts.set(env, context)
    context.catch(() => {
      this.contexts.delete(env)
    })

    return context
  }
}
