/**
 * The method surface of a KV namespace binding as the host injects it into the
 * request environment.
 *
 * @remarks
 * Read results are typed `unknown` on purpose: the binding is an external
 * object and every payload it resolves with is validated before it reaches
 * callers.
 */
export interface KvNamespaceBinding {
  get(key: string, options?: KvHostGetOptions): Promise<unknown>

  /**
   * Resolves with `{ value, metadata }`; `value` is `null` when the key is absent.
   */
  getWithMetadata(key: string, options?: KvHostGetOptions): Promise<unknown>

  put(key: string, value: KvPutValue, options?: KvHostPutOptions): Promise<unknown>

  /**
   * Resolves with `{ keys, list_complete, cursor? }`.
   */
  list(options?: KvHostListOptions): Promise<unknown>

  delete(key: string): Promise<unknown>
}

export const kvHostMethods = ["get", "getWithMetadata", "put", "list", "delete"] as const

export type KvHostMethod = (typeof kvHostMethods)[number]

/** JSON is read as `"text"` and parsed locally. */
export type KvHostValueType = "text" | "arrayBuffer"

export type KvHostGetOptions = {
  type?: KvHostValueType
  /** Seconds the edge may cache the read. */
  cacheTtl?: number
}

export type KvPutValue = string | ArrayBuffer | ArrayBufferView

export type KvHostPutOptions = {
  metadata?: unknown
  /** Absolute expiry, seconds since epoch. */
  expiration?: number
  /** Relative expiry, seconds from now. */
  expirationTtl?: number
}

export type KvHostListOptions = {
  prefix?: string
  limit?: number
  cursor?: string
}

export type KvHostListKey = {
  name: string
  expiration?: number
  metadata?: unknown
}

export type KvHostListResult = {
  keys: KvHostListKey[]
  list_complete: boolean
  cursor?: string
}

export type KvHostValueWithMetadata = {
  value: unknown
  metadata: unknown
}
