import { z } from "zod"
import type { Decoder } from "../../ports/kv-format"
import type { KvHostListOptions } from "../../ports/kv-namespace"
import type { KvOperationTarget } from "../../ports/kv-operation"
import type { KvListKey, KvListResult } from "../../ports/kv-result"
import { DeserializationError } from "../errors/kv-errors"
import { KvOperation, type KvOperationDeps } from "./kv-operation"
import { checkOption, pageLimit } from "./option-schemas"

const hostListKey = z.object({
  name: z.string(),
  expiration: z.number().optional(),
  metadata: z.unknown().optional(),
})

const hostListResult = z
  .object({
    keys: z.array(hostListKey),
    list_complete: z.boolean(),
    cursor: z.string().optional(),
  })
  .refine((page) => page.list_complete || (page.cursor !== undefined && page.cursor !== ""), {
    message: "an incomplete listing must carry a cursor",
    path: ["cursor"],
  })

/**
 * Lists one page of keys.
 *
 * @remarks
 * Each execution returns exactly one page. To enumerate a namespace, feed the
 * returned `cursor` into a new builder until `listComplete` is true, or use
 * `KvStore.listPages()`.
 *
 * `limit` is only checked to be a positive integer here; the host's maximum
 * page size is the host's to enforce, and its refusal surfaces as a
 * `HostError`.
 */
export class ListBuilder<M> extends KvOperation<KvListResult<M>> {
  private keyPrefix: string | undefined
  private pageSize: number | undefined
  private pageCursor: string | undefined

  constructor(
    deps: KvOperationDeps,
    private readonly metadataDecoder: Decoder<M>,
  ) {
    super(deps, "list")
  }

  /** Only keys starting with `value` are returned. */
  prefix(value: string): this {
    this.keyPrefix = value
    return this
  }

  /** Maximum number of keys in the page. */
  limit(value: number): this {
    this.pageSize = value
    return this
  }

  /** Continue from a previous page. An empty cursor starts from the beginning. */
  cursor(value: string): this {
    this.pageCursor = value
    return this
  }

  protected target(): KvOperationTarget {
    return {
      ...(this.keyPrefix !== undefined && { prefix: this.keyPrefix }),
      ...(this.pageCursor && { cursor: this.pageCursor }),
    }
  }

  protected async run(): Promise<KvListResult<M>> {
    const options: KvHostListOptions = {
      ...(this.keyPrefix !== undefined && { prefix: this.keyPrefix }),
      ...(this.pageSize !== undefined && {
        limit: checkOption("list", "limit", pageLimit, this.pageSize),
      }),
      ...(this.pageCursor && { cursor: this.pageCursor }),
    }

    const raw = await this.callHost((binding) => binding.list(options))

    const parsed = hostListResult.safeParse(raw)
    if (!parsed.success) {
      throw DeserializationError.response(this.operation, parsed.error, this.target())
    }

    const page = parsed.data

    return {
      keys: page.keys.map((key) => this.toListKey(key)),
      listComplete: page.list_complete,
      cursor: page.list_complete ? null : (page.cursor ?? null),
    }
  }

  private toListKey(key: z.infer<typeof hostListKey>): KvListKey<M> {
    return {
      name: key.name,
      ...(key.expiration !== undefined && { expiration: key.expiration }),
      ...(key.metadata !== undefined &&
        key.metadata !== null && { metadata: this.decodeMetadata(key.name, key.metadata) }),
    }
  }

  private decodeMetadata(name: string, raw: unknown): M {
    try {
      return this.metadataDecoder.parse(raw)
    } catch (err) {
      throw DeserializationError.metadata(name, err)
    }
  }
}
