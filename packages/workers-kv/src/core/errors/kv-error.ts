export type KvErrorCode =
  | "binding_error"
  | "configuration_error"
  | "host_error"
  | "deserialization_error"
  | "serialization_error"
  | "already_executed"

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (namespace, key, operation) without string munging.
 */
export type KvErrorContext = Readonly<Record<string, unknown>>

export type KvErrorOptions<C extends KvErrorCode = KvErrorCode> = Readonly<{
  code: C
  context?: KvErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Serialized error shape for logging and transport. JSON.stringify-safe.
 */
export type SerializedKvError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedKvError
  stack?: string
}>

export class KvError<C extends KvErrorCode = KvErrorCode> extends Error {
  /** Error code for programmatic handling */
  readonly code: C

  /** Structured metadata for debugging */
  readonly context: KvErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (host faults, payload mismatches),
   * `false` for programmer errors such as executing a builder twice.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  constructor(message: string, options: KvErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedKvError {
    return serializeKvError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * Handles:
 * - KvError instances (preserves code, context, flags)
 * - Standard Error instances (code "unknown")
 * - Non-Error values, such as a host rejecting with a bare string
 */
export function serializeKvError(
  err: unknown,
  options?: SerializeOptions,
): SerializedKvError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof KvError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      ...(err.cause !== undefined && { cause: serializeKvError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      timestamp: new Date().toISOString(),
      isRetryable: false,
      isOperational: false,
      ...(err.cause !== undefined && { cause: serializeKvError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    timestamp: new Date().toISOString(),
    isRetryable: false,
    isOperational: false,
  }
}

const kvErrorCodes: ReadonlySet<string> = new Set<KvErrorCode>([
  "binding_error",
  "configuration_error",
  "host_error",
  "deserialization_error",
  "serialization_error",
  "already_executed",
])

/**
 * Type guard for errors raised by this package.
 *
 * @example
 * ```ts
 * try {
 *   await store.put("k", "v").execute()
 * } catch (err) {
 *   if (isKvError(err) && err.code === "host_error") {
 *     // the namespace rejected the write
 *   }
 * }
 * ```
 */
export function isKvError(value: unknown): value is KvError {
  return value instanceof KvError && kvErrorCodes.has(value.code)
}
