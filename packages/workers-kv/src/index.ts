export { FakeClock } from "./adapters/clock/fake-clock"
export { SystemClock } from "./adapters/clock/system-clock"
export {
  EnvBindingsSource,
  type EnvBindingsSourceOptions,
} from "./adapters/config/env-bindings-source"
export { ObjectSource } from "./adapters/config/object-source"
export {
  MAX_KEY_BYTES,
  MAX_LIST_LIMIT,
  MAX_METADATA_BYTES,
  MemoryKvNamespace,
  type MemoryKvNamespaceOptions,
  MIN_EXPIRATION_TTL,
} from "./adapters/memory/memory-kv-namespace"
export { KvConfig } from "./core/config/kv-config"
export {
  type KvSettings,
  kvConfigSchema,
  type LoadKvConfigOptions,
  loadKvConfig,
} from "./core/config/load-kv-config"
export {
  isKvError,
  KvError,
  type KvErrorCode,
  type KvErrorContext,
  type KvErrorOptions,
  type SerializedKvError,
  type SerializeOptions,
  serializeKvError,
} from "./core/errors/kv-error"
export {
  AlreadyExecutedError,
  BindingError,
  ConfigurationError,
  DeserializationError,
  HostError,
  SerializationError,
} from "./core/errors/kv-errors"
export { bytes, formats, json, passthrough, text } from "./core/format/formats"
export { DeleteBuilder } from "./core/operation/delete-builder"
export { GetBuilder } from "./core/operation/get-builder"
export { GetWithMetadataBuilder } from "./core/operation/get-with-metadata-builder"
export { KvOperation } from "./core/operation/kv-operation"
export { ListBuilder } from "./core/operation/list-builder"
export { PutBuilder, type PutPayload } from "./core/operation/put-builder"
export {
  KvStore,
  type KvStoreDeps,
  type KvStoreOptions,
  type ListPagesOptions,
} from "./core/store/kv-store"
export { type OpenKvStoreOptions, openKvStore } from "./core/store/open-kv-store"
export type { Clock, Milliseconds, UnixSeconds } from "./ports/clock"
export type { ConfigSource } from "./ports/config-source"
export type { Decoder, ValueFormat } from "./ports/kv-format"
export type { KvKey } from "./ports/kv-key"
export type {
  KvHostGetOptions,
  KvHostListKey,
  KvHostListOptions,
  KvHostListResult,
  KvHostPutOptions,
  KvHostValueType,
  KvHostValueWithMetadata,
  KvNamespaceBinding,
  KvPutValue,
} from "./ports/kv-namespace"
export type { KvOperationName, KvOperationTarget } from "./ports/kv-operation"
export type {
  KvFound,
  KvFoundWithMetadata,
  KvListKey,
  KvListResult,
  KvNotFound,
  KvResult,
  KvResultWithMetadata,
} from "./ports/kv-result"
