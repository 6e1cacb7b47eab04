import { createPinoLogger, type Logger } from "@kvbridge/logger"
import type { Clock } from "@kvbridge/workers-kv"
import { Hono } from "hono"
import { smokeChecks } from "./checks"
import { SmokeContextCache } from "./smoke-context"

export type SmokeBindings = Record<string, unknown>

type SmokeEnv = {
  Bindings: SmokeBindings
  Variables: { logger?: Logger }
}

export type SmokeAppDeps = {
  /** Defaults to the pino logger built from `KV_LOG_LEVEL`. */
  logger?: Logger
  clock?: Clock
}

/**
 * One GET route per check. A route answers `passed` (200), or the failure
 * message with status 500.
 */
export function createSmokeApp(deps: SmokeAppDeps = {}): Hono<SmokeEnv> {
  const app = new Hono<SmokeEnv>()
  const contexts = new SmokeContextCache(deps)
  // Used when the env's own logger could not be built.
  let fallbackLogger = deps.logger

  for (const [path, check] of Object.entries(smokeChecks)) {
    app.get(path, async (c) => {
      const { logger, store } = await contexts.get(c.env)
      c.set("logger", logger)

      return c.text(await check(store))
    })
  }

  app.onError((err, c) => {
    if (!fallbackLogger) fallbackLogger = createPinoLogger()
    const logger = c.get("logger") ?? fallbackLogger
    logger.error("smoke check failed", { path: c.req.path, err })

    return c.text(err.message, 500)
  })

  return app
}
