import type { ValueFormat } from "../../ports/kv-format"
import type { KvKey } from "../../ports/kv-key"
import type { KvHostGetOptions } from "../../ports/kv-namespace"
import type { KvOperationName, KvOperationTarget } from "../../ports/kv-operation"
import type { KvResult } from "../../ports/kv-result"
import { DeserializationError } from "../errors/kv-errors"
import type { KvFormatDefaults } from "./kv-defaults"
import { KvOperation, type KvOperationDeps } from "./kv-operation"
import { checkOption, positiveSeconds } from "./option-schemas"

/**
 * Reads one value.
 *
 * @example
 * ```ts
 * const res = await store.get("greeting").cacheTtl(300).execute()
 * if (res.kind === "found") console.log(res.value)
 * ```
 */
export class GetBuilder<V> extends KvOperation<KvResult<V>> {
  private cacheTtlSeconds: number | undefined

  constructor(
    deps: KvOperationDeps,
    private readonly key: KvKey,
    private readonly format: ValueFormat<V>,
    defaults: KvFormatDefaults = {},
  ) {
    super(deps, "get")
    this.cacheTtlSeconds = defaults.cacheTtl
  }

  /** How long, in seconds, the edge may serve this read from cache. */
  cacheTtl(seconds: number): this {
    this.cacheTtlSeconds = seconds
    return this
  }

  protected target(): KvOperationTarget {
    return { key: this.key }
  }

  protected async run(): Promise<KvResult<V>> {
    const options = hostGetOptions(this.operation, this.format, this.cacheTtlSeconds)
    const raw = await this.callHost((binding) => binding.get(this.key, options))

    if (raw === null || raw === undefined) return { kind: "not_found" }

    return { kind: "found", value: decodeValue(this.key, this.format, raw) }
  }
}

export function hostGetOptions(
  operation: KvOperationName,
  format: ValueFormat<unknown>,
  cacheTtl: number | undefined,
): KvHostGetOptions {
  return {
    type: format.type,
    ...(cacheTtl !== undefined && {
      cacheTtl: checkOption(operation, "cacheTtl", positiveSeconds, cacheTtl),
    }),
  }
}

export function decodeValue<V>(key: KvKey, format: ValueFormat<V>, raw: unknown): V {
  try {
    return format.decode(raw)
  } catch (err) {
    throw DeserializationError.value(key, format.name, err)
  }
}
