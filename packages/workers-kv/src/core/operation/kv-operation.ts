import type { Logger } from "@kvbridge/logger"
import type { Clock } from "../../ports/clock"
import type { KvNamespaceBinding } from "../../ports/kv-namespace"
import type { KvOperationName, KvOperationTarget } from "../../ports/kv-operation"
import { AlreadyExecutedError, HostError } from "../errors/kv-errors"

export type KvOperationDeps = {
  binding: KvNamespaceBinding
  logger: Logger
  clock: Clock
}

/**
 * Base for the per-verb builders.
 *
 * @remarks
 * A builder accumulates configuration, then `execute()` performs exactly one
 * host call. Executing again rejects with `AlreadyExecutedError`; configuring
 * after execution has no effect.
 */
export abstract class KvOperation<R> {
  private executed = false

  protected constructor(
    protected readonly deps: KvOperationDeps,
    readonly operation: KvOperationName,
  ) {}

  get isExecuted(): boolean {
    return this.executed
  }

  async execute(): Promise<R> {
    if (this.executed) {
      throw AlreadyExecutedError.forOperation(this.operation, this.target())
    }
    this.executed = true

    return await this.run()
  }

  protected abstract run(): Promise<R>

  protected abstract target(): KvOperationTarget

  /**
   * Issues the single host call for this operation.
   *
   * @remarks
   * A rejection, or a synchronous throw from the binding, becomes a `HostError`
   * carrying the host's message.
   */
  protected async callHost<T>(call: (binding: KvNamespaceBinding) => Promise<T>): Promise<T> {
    const target = this.target()
    const logger = this.deps.logger.child({ operation: this.operation, ...target })
    const startedAt = this.deps.clock.nowMs()

    try {
      const result = await call(this.deps.binding)

      logger.debug("kv host call completed", {
        durationMs: this.deps.clock.nowMs() - startedAt,
        outcome: "ok",
      })

      return result
    } catch (err) {
      logger.warn("kv host call failed", {
        durationMs: this.deps.clock.nowMs() - startedAt,
        outcome: "host_error",
        err,
      })

      throw HostError.fromRejection(this.operation, err, target)
    }
  }
}
