import type { Clock, UnixSeconds } from "../../ports/clock"
import type {
  KvHostGetOptions,
  KvHostListKey,
  KvHostListOptions,
  KvHostListResult,
  KvHostPutOptions,
  KvHostValueType,
  KvHostValueWithMetadata,
  KvNamespaceBinding,
  KvPutValue,
} from "../../ports/kv-namespace"
import { SystemClock } from "../clock/system-clock"

/** Largest page the hosted service returns. */
export const MAX_LIST_LIMIT = 1000

/** Shortest expiry the hosted service accepts, in seconds. */
export const MIN_EXPIRATION_TTL = 60

export const MAX_KEY_BYTES = 512
export const MAX_METADATA_BYTES = 1024

const CURSOR_MARKER = "after:"

type MemoryEntry = {
  bytes: Uint8Array
  metadata?: unknown
  expiration?: UnixSeconds
}

export type MemoryKvNamespaceOptions = {
  clock?: Clock
}

/**
 * In-process KV namespace with the hosted service's observable behavior.
 *
 * @remarks
 * - listings are sorted by key and paged (`limit` defaults to and may not
 *   exceed 1000); cursors are opaque base64 strings
 * - `expiration` (absolute) and `expirationTtl` (relative) are seconds, at
 *   least 60 seconds ahead of the clock, and may not be combined
 * - expired entries are invisible to every read and listing
 * - metadata is kept as a JSON copy of what was written
 *
 * Invalid input rejects the returned promise, the way the host does.
 */
export class MemoryKvNamespace implements KvNamespaceBinding {
  private readonly entries = new Map<string, MemoryEntry>()
  private readonly clock: Clock
  private readonly encoder = new TextEncoder()
  private readonly decoder = new TextDecoder()

  constructor(options: MemoryKvNamespaceOptions = {}) {
    this.clock = options.clock ?? new SystemClock()
  }

  /** Number of live entries. */
  get size(): number {
    return this.liveNames().length
  }

  async get(key: string, options: KvHostGetOptions = {}): Promise<unknown> {
    this.checkKey(key)
    const entry = this.live(key)

    return entry ? this.decode(entry.bytes, options.type ?? "text") : null
  }

  async getWithMetadata(
    key: string,
    options: KvHostGetOptions = {},
  ): Promise<KvHostValueWithMetadata> {
    this.checkKey(key)
    const entry = this.live(key)

    if (!entry) return { value: null, metadata: null }

    return {
      value: this.decode(entry.bytes, options.type ?? "text"),
      metadata: entry.metadata ?? null,
    }
  }

  async put(key: string, value: KvPutValue, options: KvHostPutOptions = {}): Promise<void> {
    this.checkKey(key)

    const expiration = this.resolveExpiration(options)
    const metadata = options.metadata === undefined ? undefined : this.copyMetadata(options.metadata)

    this.entries.set(key, {
      bytes: this.toBytes(value),
      ...(metadata !== undefined && { metadata }),
      ...(expiration !== undefined && { expiration }),
    })
  }

  async list(options: KvHostListOptions = {}): Promise<KvHostListResult> {
    const limit = options.limit ?? MAX_LIST_LIMIT

    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new RangeError(`Invalid list limit of ${limit}; must be between 1 and ${MAX_LIST_LIMIT}`)
    }

    const prefix = options.prefix ?? ""
    const after = options.cursor ? decodeCursor(options.cursor) : undefined

    const remaining = this.liveNames().filter(
      (name) => name.startsWith(prefix) && (after === undefined || name > after),
    )
    const page = remaining.slice(0, limit)
    const last = page.at(-1)
    const cursor = remaining.length > limit && last !== undefined ? encodeCursor(last) : undefined

    return {
      keys: page.map((name) => this.listKey(name)),
      list_complete: cursor === undefined,
      ...(cursor !== undefined && { cursor }),
    }
  }

  async delete(key: string): Promise<void> {
    this.checkKey(key)
    this.entries.delete(key)
  }

  private live(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined

    if (entry.expiration !== undefined && entry.expiration <= this.nowSeconds()) {
      this.entries.delete(key)
      return undefined
    }

    return entry
  }

  private liveNames(): string[] {
    return [...this.entries.keys()].filter((name) => this.live(name) !== undefined).sort()
  }

  private listKey(name: string): KvHostListKey {
    const entry = this.entries.get(name)

    return {
      name,
      ...(entry?.expiration !== undefined && { expiration: entry.expiration }),
      ...(entry?.metadata !== undefined && { metadata: entry.metadata }),
    }
  }

  private nowSeconds(): UnixSeconds {
    return Math.floor(this.clock.nowMs() / 1000)
  }

  private resolveExpiration(options: KvHostPutOptions): UnixSeconds | undefined {
    const { expiration, expirationTtl } = options

    if (expiration !== undefined && expirationTtl !== undefined) {
      throw new TypeError("Only one of expiration and expirationTtl may be set")
    }

    if (expirationTtl !== undefined) {
      if (!Number.isInteger(expirationTtl) || expirationTtl < MIN_EXPIRATION_TTL) {
        throw new RangeError(
          `Invalid expiration_ttl of ${expirationTtl}; must be at least ${MIN_EXPIRATION_TTL}`,
        )
      }

      return this.nowSeconds() + expirationTtl
    }

    if (expiration !== undefined) {
      const earliest = this.nowSeconds() + MIN_EXPIRATION_TTL

      if (!Number.isInteger(expiration) || expiration < earliest) {
        throw new RangeError(
          `Invalid expiration of ${expiration}; must be at least ${MIN_EXPIRATION_TTL} seconds in the future`,
        )
      }

      return expiration
    }

    return undefined
  }

  private checkKey(key: string): void {
    if (key === "") {
      throw new TypeError("Key names must not be empty")
    }

    const length = this.encoder.encode(key).byteLength
    if (length > MAX_KEY_BYTES) {
      throw new RangeError(`Key of ${length} bytes exceeds the ${MAX_KEY_BYTES} byte limit`)
    }
  }

  private copyMetadata(metadata: unknown): unknown {
    const encoded: string | undefined = JSON.stringify(metadata)

    if (encoded === undefined) {
      throw new TypeError("Metadata has no JSON representation")
    }

    const length = this.encoder.encode(encoded).byteLength
    if (length > MAX_METADATA_BYTES) {
      throw new RangeError(
        `Metadata of ${length} bytes exceeds the ${MAX_METADATA_BYTES} byte limit`,
      )
    }

    return JSON.parse(encoded)
  }

  private toBytes(value: KvPutValue): Uint8Array {
    if (typeof value === "string") return this.encoder.encode(value)
    if (value instanceof ArrayBuffer) return new Uint8Array(value.slice(0))

    return new Uint8Array(value.buffer, value.byteOffset, value.byteLength).slice()
  }

  private decode(bytes: Uint8Array, type: KvHostValueType): unknown {
    switch (type) {
      case "text":
        return this.decoder.decode(bytes)
      case "arrayBuffer":
        return bytes.slice().buffer
    }
  }
}

function encodeCursor(lastKey: string): string {
  return Buffer.from(`${CURSOR_MARKER}${lastKey}`, "utf8").toString("base64")
}

function decodeCursor(cursor: string): string {
  const decoded = Buffer.from(cursor, "base64").toString("utf8")

  if (!decoded.startsWith(CURSOR_MARKER)) {
    throw new TypeError(`Invalid cursor "${cursor}"`)
  }

  return decoded.slice(CURSOR_MARKER.length)
}
