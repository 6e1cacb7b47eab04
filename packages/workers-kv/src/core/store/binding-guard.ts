import { type KvHostMethod, type KvNamespaceBinding, kvHostMethods } from "../../ports/kv-namespace"

/** Host methods `candidate` lacks; all of them when it is not an object. */
export function missingHostMethods(candidate: unknown): KvHostMethod[] {
  if ((typeof candidate !== "object" && typeof candidate !== "function") || candidate === null) {
    return [...kvHostMethods]
  }

  return kvHostMethods.filter((method) => typeof Reflect.get(candidate, method) !== "function")
}

export function isNamespaceBinding(candidate: unknown): candidate is KvNamespaceBinding {
  return missingHostMethods(candidate).length === 0
}
