import { z } from "zod"
import type { Decoder, ValueFormat } from "../../ports/kv-format"
import type { KvKey } from "../../ports/kv-key"
import type { KvOperationTarget } from "../../ports/kv-operation"
import type { KvResultWithMetadata } from "../../ports/kv-result"
import { DeserializationError } from "../errors/kv-errors"
import { decodeValue, hostGetOptions } from "./get-builder"
import type { KvFormatDefaults } from "./kv-defaults"
import { KvOperation, type KvOperationDeps } from "./kv-operation"

const hostValueWithMetadata = z
  .object({
    value: z.unknown(),
    metadata: z.unknown(),
  })
  .nullable()

/**
 * Reads one value together with the metadata it was written with.
 *
 * @remarks
 * Metadata is `null` when the entry has none. When present it is passed
 * through the metadata decoder; a decoder failure is a `DeserializationError`,
 * never a `HostError`.
 */
export class GetWithMetadataBuilder<V, M> extends KvOperation<KvResultWithMetadata<V, M>> {
  private cacheTtlSeconds: number | undefined

  constructor(
    deps: KvOperationDeps,
    private readonly key: KvKey,
    private readonly format: ValueFormat<V>,
    private readonly metadataDecoder: Decoder<M>,
    defaults: KvFormatDefaults = {},
  ) {
    super(deps, "getWithMetadata")
    this.cacheTtlSeconds = defaults.cacheTtl
  }

  cacheTtl(seconds: number): this {
    this.cacheTtlSeconds = seconds
    return this
  }

  protected target(): KvOperationTarget {
    return { key: this.key }
  }

  protected async run(): Promise<KvResultWithMetadata<V, M>> {
    const options = hostGetOptions(this.operation, this.format, this.cacheTtlSeconds)
    const raw = await this.callHost((binding) => binding.getWithMetadata(this.key, options))

    const parsed = hostValueWithMetadata.safeParse(raw)
    if (!parsed.success) {
      throw DeserializationError.response(this.operation, parsed.error, this.target())
    }

    const pair = parsed.data
    if (pair === null || pair.value === null || pair.value === undefined) {
      return { kind: "not_found" }
    }

    return {
      kind: "found",
      value: decodeValue(this.key, this.format, pair.value),
      metadata: this.decodeMetadata(pair.metadata),
    }
  }

  private decodeMetadata(raw: unknown): M | null {
    if (raw === null || raw === undefined) return null

    try {
      return this.metadataDecoder.parse(raw)
    } catch (err) {
      throw DeserializationError.metadata(this.key, err)
    }
  }
}
