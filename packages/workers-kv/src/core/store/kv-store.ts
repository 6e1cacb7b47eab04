import { createNullLogger, type Logger } from "@kvbridge/logger"
import { SystemClock } from "../../adapters/clock/system-clock"
import type { Clock } from "../../ports/clock"
import type { Decoder, ValueFormat } from "../../ports/kv-format"
import type { KvKey } from "../../ports/kv-key"
import type { KvNamespaceBinding, KvPutValue } from "../../ports/kv-namespace"
import type { KvListResult } from "../../ports/kv-result"
import { BindingError } from "../errors/kv-errors"
import { passthrough, text } from "../format/formats"
import { DeleteBuilder } from "../operation/delete-builder"
import { GetBuilder } from "../operation/get-builder"
import { GetWithMetadataBuilder } from "../operation/get-with-metadata-builder"
import type { KvFormatDefaults } from "../operation/kv-defaults"
import type { KvOperationDeps } from "../operation/kv-operation"
import { ListBuilder } from "../operation/list-builder"
import { PutBuilder } from "../operation/put-builder"
import { isNamespaceBinding, missingHostMethods } from "./binding-guard"

export type KvStoreDeps = {
  logger?: Logger
  clock?: Clock
}

export type KvStoreOptions = {
  /** Default edge cache TTL, in seconds, for every read builder. */
  cacheTtl?: number
}

export type ListPagesOptions = {
  prefix?: string
  /** Page size. */
  limit?: number
  /** Resume from a cursor returned by an earlier listing. */
  cursor?: string
}

/**
 * Handle on one KV namespace binding.
 *
 * @remarks
 * The handle holds a reference to the host's binding object and never owns
 * it: the host keeps it alive for the request, and the handle only forwards
 * calls. Every method returns a fresh builder; nothing is sent to the host
 * until `execute()`.
 *
 * @example
 * ```ts
 * export default {
 *   async fetch(request: Request, env: Env) {
 *     const store = KvStore.open(env, "SESSIONS")
 *
 *     await store.put("k1", "v1").expirationTtl(3600).execute()
 *     const res = await store.get("k1").execute()
 *
 *     return new Response(res.kind === "found" ? res.value : "missing")
 *   },
 * }
 * ```
 */
export class KvStore {
  private readonly operationDeps: KvOperationDeps

  private constructor(
    readonly namespace: string,
    binding: KvNamespaceBinding,
    logger: Logger,
    clock: Clock,
    private readonly defaults: KvFormatDefaults,
  ) {
    this.operationDeps = { binding, logger, clock }
  }

  /**
   * Resolves `env[binding]` and checks that it exposes the KV host methods.
   *
   * @throws BindingError when the binding is missing or is not a namespace.
   */
  static open(
    env: object,
    binding: string,
    deps: KvStoreDeps = {},
    options: KvStoreOptions = {},
  ): KvStore {
    const candidate: unknown = Reflect.get(env, binding)

    if (candidate === undefined || candidate === null) {
      throw BindingError.missing(binding)
    }

    if (!isNamespaceBinding(candidate)) {
      throw BindingError.notANamespace(binding, missingHostMethods(candidate))
    }

    const logger = (deps.logger ?? createNullLogger()).child({ namespace: binding })

    return new KvStore(
      binding,
      candidate,
      logger,
      deps.clock ?? new SystemClock(),
      options.cacheTtl !== undefined ? { cacheTtl: options.cacheTtl } : {},
    )
  }

  /**
   * Service-worker style scripts receive bindings as globals.
   */
  static fromGlobal(
    binding: string,
    deps: KvStoreDeps = {},
    options: KvStoreOptions = {},
  ): KvStore {
    return KvStore.open(globalThis, binding, deps, options)
  }

  get(key: KvKey): GetBuilder<string>
  get<V>(key: KvKey, format: ValueFormat<V>): GetBuilder<V>
  get<V>(key: KvKey, format?: ValueFormat<V>): GetBuilder<V> | GetBuilder<string> {
    return format
      ? new GetBuilder(this.operationDeps, key, format, this.defaults)
      : new GetBuilder(this.operationDeps, key, text, this.defaults)
  }

  getWithMetadata(key: KvKey): GetWithMetadataBuilder<string, unknown>
  getWithMetadata<V>(key: KvKey, format: ValueFormat<V>): GetWithMetadataBuilder<V, unknown>
  getWithMetadata<V, M>(
    key: KvKey,
    format: ValueFormat<V>,
    metadataDecoder: Decoder<M>,
  ): GetWithMetadataBuilder<V, M>
  getWithMetadata<V, M>(
    key: KvKey,
    format?: ValueFormat<V>,
    metadataDecoder?: Decoder<M>,
  ):
    | GetWithMetadataBuilder<V, M>
    | GetWithMetadataBuilder<V, unknown>
    | GetWithMetadataBuilder<string, unknown> {
    if (!format) {
      return new GetWithMetadataBuilder(this.operationDeps, key, text, passthrough, this.defaults)
    }

    if (!metadataDecoder) {
      return new GetWithMetadataBuilder(this.operationDeps, key, format, passthrough, this.defaults)
    }

    return new GetWithMetadataBuilder(this.operationDeps, key, format, metadataDecoder, this.defaults)
  }

  /** Writes a string or binary value as-is. */
  put(key: KvKey, value: KvPutValue): PutBuilder {
    return new PutBuilder(this.operationDeps, key, { kind: "raw", value })
  }

  /** Writes `value` encoded with `JSON.stringify`. */
  putJson(key: KvKey, value: unknown): PutBuilder {
    return new PutBuilder(this.operationDeps, key, { kind: "json", value })
  }

  list(): ListBuilder<unknown>
  list<M>(metadataDecoder: Decoder<M>): ListBuilder<M>
  list<M>(metadataDecoder?: Decoder<M>): ListBuilder<M> | ListBuilder<unknown> {
    return metadataDecoder
      ? new ListBuilder(this.operationDeps, metadataDecoder)
      : new ListBuilder(this.operationDeps, passthrough)
  }

  /**
   * Walks a listing page by page, one host call per page.
   *
   * @remarks
   * Pages are fetched lazily as the caller iterates; stopping early issues no
   * further calls.
   *
   * @example
   * ```ts
   * for await (const page of store.listPages({ prefix: "user:", limit: 100 })) {
   *   for (const key of page.keys) console.log(key.name)
   * }
   * ```
   */
  listPages(options?: ListPagesOptions): AsyncGenerator<KvListResult<unknown>, void, undefined>
  listPages<M>(
    options: ListPagesOptions,
    metadataDecoder: Decoder<M>,
  ): AsyncGenerator<KvListResult<M>, void, undefined>
  listPages<M>(
    options: ListPagesOptions = {},
    metadataDecoder?: Decoder<M>,
  ):
    | AsyncGenerator<KvListResult<M>, void, undefined>
    | AsyncGenerator<KvListResult<unknown>, void, undefined> {
    return metadataDecoder ? this.pages(options, metadataDecoder) : this.pages(options, passthrough)
  }

  delete(key: KvKey): DeleteBuilder {
    return new DeleteBuilder(this.operationDeps, key)
  }

  private async *pages<M>(
    options: ListPagesOptions,
    metadataDecoder: Decoder<M>,
  ): AsyncGenerator<KvListResult<M>, void, undefined> {
    let cursor = options.cursor

    for (;;) {
      const builder = new ListBuilder(this.operationDeps, metadataDecoder)

      if (options.prefix !== undefined) builder.prefix(options.prefix)
      if (options.limit !== undefined) builder.limit(options.limit)
      if (cursor) builder.cursor(cursor)

      const page = await builder.execute()
      yield page

      if (page.listComplete || page.cursor === null) return
      cursor = page.cursor
    }
  }
}
