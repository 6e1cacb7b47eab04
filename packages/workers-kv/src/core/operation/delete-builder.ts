import type { KvKey } from "../../ports/kv-key"
import type { KvOperationTarget } from "../../ports/kv-operation"
import { KvOperation, type KvOperationDeps } from "./kv-operation"

/**
 * Deletes one key. Deleting a key that does not exist succeeds.
 */
export class DeleteBuilder extends KvOperation<void> {
  constructor(
    deps: KvOperationDeps,
    private readonly key: KvKey,
  ) {
    super(deps, "delete")
  }

  protected target(): KvOperationTarget {
    return { key: this.key }
  }

  protected async run(): Promise<void> {
    await this.callHost((binding) => binding.delete(this.key))
  }
}
