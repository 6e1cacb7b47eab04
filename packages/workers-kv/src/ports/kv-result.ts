export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a KV read.
 *
 * @remarks
 * Absence is a normal outcome, never an error.
 */
export type KvResult<T> = KvFound<T> | KvNotFound

export type KvFoundWithMetadata<T, M> = {
  readonly kind: "found"
  readonly value: T
  /** `null` when the entry was written without metadata. */
  readonly metadata: M | null
}

export type KvResultWithMetadata<T, M> = KvFoundWithMetadata<T, M> | KvNotFound

export type KvListKey<M> = {
  readonly name: string
  /** Expiry as seconds since epoch, when the key has one. */
  readonly expiration?: number
  readonly metadata?: M
}

/**
 * One page of a key listing.
 */
export type KvListResult<M> = {
  readonly keys: readonly KvListKey<M>[]
  readonly listComplete: boolean
  /** Pass to `ListBuilder.cursor()` to fetch the next page; `null` once complete. */
  readonly cursor: string | null
}
