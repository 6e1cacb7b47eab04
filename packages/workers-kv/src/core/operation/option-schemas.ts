import { z } from "zod"
import type { KvOperationName } from "../../ports/kv-operation"
import { ConfigurationError } from "../errors/kv-errors"

/** Whole, positive seconds: expiration timestamps, TTLs, cache TTLs. */
export const positiveSeconds = z.number().int().positive()

/** Local bound only; the host enforces its own maximum page size. */
export const pageLimit = z.number().int().positive()

/**
 * Validates a builder option at execution time.
 *
 * @throws ConfigurationError when `value` does not satisfy `schema`.
 */
export function checkOption<T>(
  operation: KvOperationName,
  option: string,
  schema: z.ZodType<T>,
  value: unknown,
): T {
  const result = schema.safeParse(value)

  if (!result.success) {
    throw ConfigurationError.invalidOption({ operation, option, value, cause: result.error })
  }

  return result.data
}
