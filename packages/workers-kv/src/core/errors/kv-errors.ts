import { z } from "zod"
import type { KvOperationName, KvOperationTarget } from "../../ports/kv-operation"
import { KvError } from "./kv-error"

function describeCause(cause: unknown): string {
  if (cause instanceof z.ZodError) return z.prettifyError(cause)
  if (cause instanceof Error) return cause.message
  if (typeof cause === "string") return cause

  return "unknown reason"
}

function rejectionMessage(cause: unknown): string | undefined {
  if (cause instanceof Error) return cause.message
  if (typeof cause === "string") return cause
  if (typeof cause === "object" && cause !== null) {
    const message: unknown = Reflect.get(cause, "message")
    if (typeof message === "string") return message
  }

  return undefined
}

export class BindingError extends KvError<"binding_error"> {
  static missing(binding: string): BindingError {
    return new BindingError(`KV namespace binding "${binding}" is not defined`, {
      code: "binding_error",
      context: { binding },
    })
  }

  static notANamespace(binding: string, missingMethods: readonly string[]): BindingError {
    return new BindingError(
      `Binding "${binding}" is not a KV namespace (missing ${missingMethods.join(", ")})`,
      {
        code: "binding_error",
        context: { binding, missingMethods: [...missingMethods] },
      },
    )
  }
}

export class ConfigurationError extends KvError<"configuration_error"> {
  static conflictingExpiration(key: string): ConfigurationError {
    return new ConfigurationError(
      `Put for "${key}" sets both expiration and expirationTtl; set only one`,
      {
        code: "configuration_error",
        context: { operation: "put", key },
      },
    )
  }

  static invalidOption(input: {
    operation: KvOperationName
    option: string
    value: unknown
    cause: unknown
  }): ConfigurationError {
    return new ConfigurationError(
      `Invalid ${input.option} for ${input.operation}: ${describeCause(input.cause)}`,
      {
        code: "configuration_error",
        context: { operation: input.operation, option: input.option, value: input.value },
      },
    )
  }

  static invalidConfig(cause: unknown): ConfigurationError {
    return new ConfigurationError(
      `KV configuration validation failed:\n${describeCause(cause)}`,
      { code: "configuration_error", cause },
    )
  }
}

export class HostError extends KvError<"host_error"> {
  /**
   * Wraps whatever the host rejected with. The message is the host's own.
   */
  static fromRejection(
    operation: KvOperationName,
    cause: unknown,
    target: KvOperationTarget = {},
  ): HostError {
    return new HostError(rejectionMessage(cause) ?? `KV ${operation} failed`, {
      code: "host_error",
      cause,
      context: { operation, ...target },
    })
  }
}

export class DeserializationError extends KvError<"deserialization_error"> {
  static value(key: string, format: string, cause: unknown): DeserializationError {
    return new DeserializationError(
      `Value for "${key}" could not be decoded as ${format}: ${describeCause(cause)}`,
      {
        code: "deserialization_error",
        cause,
        context: { key, format },
      },
    )
  }

  static metadata(key: string, cause: unknown): DeserializationError {
    return new DeserializationError(
      `Metadata for "${key}" could not be decoded: ${describeCause(cause)}`,
      {
        code: "deserialization_error",
        cause,
        context: { key },
      },
    )
  }

  static response(
    operation: KvOperationName,
    cause: unknown,
    target: KvOperationTarget = {},
  ): DeserializationError {
    return new DeserializationError(
      `Unexpected ${operation} response from host: ${describeCause(cause)}`,
      {
        code: "deserialization_error",
        cause,
        context: { operation, ...target },
      },
    )
  }
}

export class SerializationError extends KvError<"serialization_error"> {
  static value(key: string, cause: unknown): SerializationError {
    return new SerializationError(
      `Value for "${key}" is not JSON-serializable: ${describeCause(cause)}`,
      {
        code: "serialization_error",
        cause,
        context: { key },
      },
    )
  }

  static metadata(key: string, cause: unknown): SerializationError {
    return new SerializationError(
      `Metadata for "${key}" is not JSON-serializable: ${describeCause(cause)}`,
      {
        code: "serialization_error",
        cause,
        context: { key },
      },
    )
  }
}

export class AlreadyExecutedError extends KvError<"already_executed"> {
  static forOperation(
    operation: KvOperationName,
    target: KvOperationTarget = {},
  ): AlreadyExecutedError {
    return new AlreadyExecutedError(`This ${operation} builder has already been executed`, {
      code: "already_executed",
      context: { operation, ...target },
      isOperational: false,
    })
  }
}
