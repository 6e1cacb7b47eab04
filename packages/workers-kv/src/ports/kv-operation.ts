export type KvOperationName = "get" | "getWithMetadata" | "put" | "list" | "delete"

/**
 * Identifies what a single host call targeted, for logs and error context.
 */
export type KvOperationTarget = {
  key?: string
  prefix?: string
  cursor?: string
}
