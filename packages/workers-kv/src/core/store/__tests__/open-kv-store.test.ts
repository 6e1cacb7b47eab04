import { createNullLogger } from "@kvbridge/logger"
import { MemoryKvNamespace } from "../../../adapters/memory/memory-kv-namespace"
import { keys } from "../../../tests/utils/kv-test-helpers"
import { BindingError, ConfigurationError } from "../../errors/kv-errors"
import { openKvStore } from "../open-kv-store"

describe("openKvStore", () => {
  const logger = createNullLogger()

  it("opens the KV binding by default", async () => {
    const store = await openKvStore({ KV: new MemoryKvNamespace() }, { logger })

    expect(store.namespace).toBe("KV")
  })

  it("opens the binding named by KV_BINDING", async () => {
    const sessions = new MemoryKvNamespace()
    await sessions.put(keys.one(), "v1")

    const store = await openKvStore({ KV_BINDING: "SESSIONS", SESSIONS: sessions }, { logger })

    expect(store.namespace).toBe("SESSIONS")
    await expect(store.get(keys.one()).execute()).resolves.toStrictEqual({
      kind: "found",
      value: "v1",
    })
  })

  it("prefers overrides to env variables", async () => {
    const env = { KV_BINDING: "SESSIONS", CACHE: new MemoryKvNamespace() }

    const store = await openKvStore(env, { logger, overrides: { BINDING: "CACHE" } })

    expect(store.namespace).toBe("CACHE")
  })

  it("reads variables under a custom prefix", async () => {
    const env = { STORE_BINDING: "CACHE", CACHE: new MemoryKvNamespace() }

    const store = await openKvStore(env, { logger, prefix: "STORE_" })

    expect(store.namespace).toBe("CACHE")
  })

  it("applies KV_CACHE_TTL to reads", async () => {
    const ns = new MemoryKvNamespace()
    const get = vi.spyOn(ns, "get")

    const store = await openKvStore({ KV: ns, KV_CACHE_TTL: "90" }, { logger })
    await store.get(keys.one()).execute()

    expect(get).toHaveBeenCalledWith(keys.one(), { type: "text", cacheTtl: 90 })
  })

  it("rejects invalid variables", async () => {
    const open = openKvStore({ KV: new MemoryKvNamespace(), KV_LOG_LEVEL: "loud" }, { logger })

    await expect(open).rejects.toBeInstanceOf(ConfigurationError)
  })

  it("rejects a missing binding", async () => {
    const opening = openKvStore({ KV_BINDING: "NOPE" }, { logger })

    await expect(opening).rejects.toBeInstanceOf(BindingError)
    await expect(opening).rejects.toMatchObject({
      code: "binding_error",
      message: 'KV namespace binding "NOPE" is not defined',
      context: { binding: "NOPE" },
    })
  })
})
