import type { KvKey } from "../../ports/kv-key"
import type { KvHostPutOptions, KvPutValue } from "../../ports/kv-namespace"
import type { KvOperationTarget } from "../../ports/kv-operation"
import { ConfigurationError, SerializationError } from "../errors/kv-errors"
import { KvOperation, type KvOperationDeps } from "./kv-operation"
import { checkOption, positiveSeconds } from "./option-schemas"

/**
 * What a put writes: a value handed to the host as-is, or a value encoded as
 * JSON text when the builder executes.
 */
export type PutPayload =
  | { readonly kind: "raw"; readonly value: KvPutValue }
  | { readonly kind: "json"; readonly value: unknown }

const NO_METADATA = Symbol("no-metadata")

/**
 * Writes one value.
 *
 * @remarks
 * Configuration methods never throw; every option is checked when `execute()`
 * runs, before the host is contacted:
 * - `expiration` together with `expirationTtl` is a `ConfigurationError`
 * - a non-integer or non-positive expiry is a `ConfigurationError`
 * - metadata (or a `putJson` value) that JSON cannot represent is a
 *   `SerializationError`
 *
 * @example
 * ```ts
 * await store
 *   .put("session:abc", token)
 *   .metadata({ userId: "u-1" })
 *   .expirationTtl(3600)
 *   .execute()
 * ```
 */
export class PutBuilder extends KvOperation<void> {
  private meta: unknown = NO_METADATA
  private expiresAt: number | undefined
  private ttlSeconds: number | undefined

  constructor(
    deps: KvOperationDeps,
    private readonly key: KvKey,
    private readonly payload: PutPayload,
  ) {
    super(deps, "put")
  }

  /** Arbitrary JSON-serializable value stored alongside the entry. */
  metadata(value: unknown): this {
    this.meta = value
    return this
  }

  /** Absolute expiry: seconds since epoch, or a Date (truncated to whole seconds). */
  expiration(at: number | Date): this {
    this.expiresAt = at instanceof Date ? Math.floor(at.getTime() / 1000) : at
    return this
  }

  /** Relative expiry in seconds from the time of the write. */
  expirationTtl(seconds: number): this {
    this.ttlSeconds = seconds
    return this
  }

  protected target(): KvOperationTarget {
    return { key: this.key }
  }

  protected async run(): Promise<void> {
    const options = this.hostOptions()
    const value = this.encodeValue()

    await this.callHost((binding) => binding.put(this.key, value, options))
  }

  private hostOptions(): KvHostPutOptions {
    if (this.expiresAt !== undefined && this.ttlSeconds !== undefined) {
      throw ConfigurationError.conflictingExpiration(this.key)
    }

    return {
      ...(this.meta !== NO_METADATA && { metadata: this.encodeMetadata(this.meta) }),
      ...(this.expiresAt !== undefined && {
        expiration: checkOption("put", "expiration", positiveSeconds, this.expiresAt),
      }),
      ...(this.ttlSeconds !== undefined && {
        expirationTtl: checkOption("put", "expirationTtl", positiveSeconds, this.ttlSeconds),
      }),
    }
  }

  private encodeValue(): KvPutValue {
    if (this.payload.kind === "raw") return this.payload.value

    try {
      return toJsonText(this.payload.value)
    } catch (err) {
      throw SerializationError.value(this.key, err)
    }
  }

  /**
   * Metadata crosses the boundary as a JSON document, so the host receives a
   * plain copy (Dates become strings, undefined fields disappear).
   */
  private encodeMetadata(value: unknown): unknown {
    try {
      return JSON.parse(toJsonText(value))
    } catch (err) {
      throw SerializationError.metadata(this.key, err)
    }
  }
}

function toJsonText(value: unknown): string {
  const encoded: string | undefined = JSON.stringify(value)

  if (encoded === undefined) {
    throw new TypeError(`${typeof value} has no JSON representation`)
  }

  return encoded
}
