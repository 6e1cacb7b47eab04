import type { KvHostValueType } from "./kv-namespace"

/**
 * Validates an untyped value into `T`, throwing when it does not fit.
 *
 * @remarks
 * Zod schemas satisfy this port structurally, so `z.object({...})` can be
 * passed wherever a decoder is expected.
 */
export interface Decoder<T> {
  parse(input: unknown): T
}

/**
 * Selects how a stored value is read from the host and decoded for the caller.
 *
 * @remarks
 * `decode` receives the payload the host resolved for `type` and must throw
 * when it cannot produce a `V`; callers see that as a `DeserializationError`.
 */
export interface ValueFormat<V> {
  readonly name: string
  readonly type: KvHostValueType
  decode(raw: unknown): V
}
