/**
 * Represents a key in a KV namespace.
 *
 * @remarks
 * Keys are typically namespaced strings (e.g., "users:123", "config:app").
 */
export type KvKey = string
