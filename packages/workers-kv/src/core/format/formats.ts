import type { Decoder, ValueFormat } from "../../ports/kv-format"

function describeRaw(raw: unknown): string {
  if (raw === null) return "null"
  if (raw instanceof ArrayBuffer) return "ArrayBuffer"
  if (ArrayBuffer.isView(raw)) return raw.constructor.name

  return typeof raw
}

/**
 * Reads the value as UTF-8 text.
 */
export const text: ValueFormat<string> = {
  name: "text",
  type: "text",
  decode(raw) {
    if (typeof raw === "string") return raw

    throw new TypeError(`expected a string payload, received ${describeRaw(raw)}`)
  },
}

/**
 * Reads the value as raw bytes.
 */
export const bytes: ValueFormat<Uint8Array> = {
  name: "bytes",
  type: "arrayBuffer",
  decode(raw) {
    if (raw instanceof ArrayBuffer) return new Uint8Array(raw)
    if (ArrayBuffer.isView(raw)) {
      return new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength)
    }

    throw new TypeError(`expected an ArrayBuffer payload, received ${describeRaw(raw)}`)
  },
}

/**
 * Reads the value as JSON text and parses it locally.
 *
 * @remarks
 * Parsing happens here rather than in the host so a malformed document surfaces
 * as a `DeserializationError` instead of a host failure. Pass a decoder (a zod
 * schema works) to validate the parsed document into `T`.
 *
 * @example
 * ```ts
 * const session = z.object({ userId: z.string(), expiresAt: z.number() })
 * const res = await store.get("session:abc", formats.json(session)).execute()
 * ```
 */
export function json(): ValueFormat<unknown>
export function json<T>(decoder: Decoder<T>): ValueFormat<T>
export function json<T>(decoder?: Decoder<T>): ValueFormat<unknown> {
  return {
    name: "json",
    type: "text",
    decode(raw) {
      const parsed: unknown = JSON.parse(text.decode(raw))

      return decoder ? decoder.parse(parsed) : parsed
    },
  }
}

export const formats = { text, bytes, json } as const

/** Decoder that accepts any value unchanged. */
export const passthrough: Decoder<unknown> = {
  parse: (input) => input,
}
