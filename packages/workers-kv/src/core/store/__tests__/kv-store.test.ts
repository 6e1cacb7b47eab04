import type { Logger } from "@kvbridge/logger"
import { mock } from "vitest-mock-extended"
import { z } from "zod"
import { FakeClock } from "../../../adapters/clock/fake-clock"
import { MemoryKvNamespace } from "../../../adapters/memory/memory-kv-namespace"
import type { Mock } from "../../../tests/mock"
import { bytes, keys, T0, T0_SECONDS } from "../../../tests/utils/kv-test-helpers"
import { BindingError, ConfigurationError } from "../../errors/kv-errors"
import { formats } from "../../format/formats"
import { KvStore } from "../kv-store"

describe("KvStore", () => {
  let clock: FakeClock
  let ns: MemoryKvNamespace
  let store: KvStore

  beforeEach(() => {
    clock = new FakeClock(T0)
    ns = new MemoryKvNamespace({ clock })
    store = KvStore.open({ KV: ns }, "KV", { clock })
  })

  describe("open", () => {
    it("remembers the binding name", () => {
      expect(store.namespace).toBe("KV")
    })

    it.each([
      ["is absent", {}],
      ["is undefined", { KV: undefined }],
      ["is null", { KV: null }],
    ])("rejects a binding that %s", (_label, env) => {
      expect(() => KvStore.open(env, "KV")).toThrow(BindingError)
      expect(() => KvStore.open(env, "KV")).toThrow('KV namespace binding "KV" is not defined')
    })

    it("rejects an object missing host methods", () => {
      const env = { KV: { get: async () => null, put: async () => undefined } }

      expect(() => KvStore.open(env, "KV")).toThrow(
        'Binding "KV" is not a KV namespace (missing getWithMetadata, list, delete)',
      )
    })

    it("rejects a plain-text variable", () => {
      const err = (() => {
        try {
          KvStore.open({ KV: "not-a-namespace" }, "KV")
        } catch (e) {
          return e
        }
      })()

      expect(err).toBeInstanceOf(BindingError)
      if (err instanceof BindingError) {
        expect(err.context).toEqual({
          binding: "KV",
          missingMethods: ["get", "getWithMetadata", "put", "list", "delete"],
        })
      }
    })

    it("scopes the logger to the namespace", () => {
      const logger: Mock<Logger> = mock<Logger>()

      KvStore.open({ SESSIONS: ns }, "SESSIONS", { logger })

      expect(logger.child).toHaveBeenCalledWith({ namespace: "SESSIONS" })
    })
  })

  describe("fromGlobal", () => {
    afterEach(() => {
      vi.unstubAllGlobals()
    })

    it("resolves the binding on globalThis", async () => {
      vi.stubGlobal("GLOBAL_KV", ns)
      await ns.put(keys.one(), "v1")

      const globalStore = KvStore.fromGlobal("GLOBAL_KV")

      await expect(globalStore.get(keys.one()).execute()).resolves.toStrictEqual({
        kind: "found",
        value: "v1",
      })
    })

    it("rejects a missing global", () => {
      expect(() => KvStore.fromGlobal("NO_SUCH_KV")).toThrow(BindingError)
    })
  })

  it("runs the put/get/getWithMetadata/delete scenario", async () => {
    await store.put("k1", "v1").execute()
    await expect(store.get("k1").execute()).resolves.toStrictEqual({ kind: "found", value: "v1" })

    await store.put("k2", "v2").metadata({ a: 1 }).execute()
    await expect(store.getWithMetadata("k2").execute()).resolves.toStrictEqual({
      kind: "found",
      value: "v2",
      metadata: { a: 1 },
    })

    await store.delete("k1").execute()
    await expect(store.get("k1").execute()).resolves.toStrictEqual({ kind: "not_found" })
  })

  describe("round trips", () => {
    it("returns a JSON value and typed metadata", async () => {
      const profile = z.object({ name: z.string(), admin: z.boolean() })
      const meta = z.object({ version: z.number() })

      await store.putJson(keys.one(), { name: "Ada", admin: true }).metadata({ version: 2 }).execute()

      const res = await store.getWithMetadata(keys.one(), formats.json(profile), meta).execute()

      expect(res).toStrictEqual({
        kind: "found",
        value: { name: "Ada", admin: true },
        metadata: { version: 2 },
      })
    })

    it("returns bytes", async () => {
      await store.put(keys.one(), bytes.a()).execute()

      const res = await store.get(keys.one(), formats.bytes).execute()

      expect(res).toStrictEqual({ kind: "found", value: bytes.a() })
    })

    it("returns null metadata for an entry written without any", async () => {
      await store.put(keys.one(), "v1").execute()

      await expect(store.getWithMetadata(keys.one(), formats.text).execute()).resolves.toStrictEqual(
        { kind: "found", value: "v1", metadata: null },
      )
    })
  })

  it("deletes a key that was never written", async () => {
    await expect(store.delete(keys.missing()).execute()).resolves.toBeUndefined()
  })

  it("returns not_found for a key that was never written", async () => {
    await expect(store.get(keys.missing()).execute()).resolves.toStrictEqual({ kind: "not_found" })
    await expect(store.getWithMetadata(keys.missing()).execute()).resolves.toStrictEqual({
      kind: "not_found",
    })
  })

  describe("expiration", () => {
    it("expires an entry written with a ttl", async () => {
      await store.put(keys.one(), "v1").expirationTtl(600).execute()

      clock.advance(600_000)

      await expect(store.get(keys.one()).execute()).resolves.toStrictEqual({ kind: "not_found" })
    })

    it("lists the absolute expiration", async () => {
      await store.put(keys.one(), "v1").expiration(new Date(T0 + 3_600_000)).execute()

      const page = await store.list().execute()

      expect(page.keys).toStrictEqual([{ name: keys.one(), expiration: T0_SECONDS + 3600 }])
    })

    it("rejects both expiry forms without touching the namespace", async () => {
      const put = vi.spyOn(ns, "put")

      await expect(
        store.put(keys.one(), "v1").expiration(T0_SECONDS + 600).expirationTtl(600).execute(),
      ).rejects.toBeInstanceOf(ConfigurationError)

      expect(put).not.toHaveBeenCalled()
      await expect(store.get(keys.one()).execute()).resolves.toStrictEqual({ kind: "not_found" })
    })
  })

  describe("listing", () => {
    const names = ["a", "b", "c", "d", "e"]

    beforeEach(async () => {
      for (const name of names) {
        await store.put(name, name).execute()
      }
    })

    it("follows cursors until the listing is complete", async () => {
      const first = await store.list().limit(2).execute()

      expect(first.listComplete).toBe(false)
      expect(first.cursor).toEqual(expect.any(String))

      const seen = first.keys.map((key) => key.name)
      let cursor = first.cursor

      while (cursor !== null) {
        const page = await store.list().limit(2).cursor(cursor).execute()
        seen.push(...page.keys.map((key) => key.name))
        cursor = page.cursor
      }

      expect(seen).toEqual(names)
    })

    it("listPages yields one page per host call", async () => {
      const list = vi.spyOn(ns, "list")
      const pages = []

      for await (const page of store.listPages({ limit: 2 })) {
        pages.push(page)
      }

      expect(list).toHaveBeenCalledTimes(3)
      expect(pages.map((page) => page.keys.map((key) => key.name))).toEqual([
        ["a", "b"],
        ["c", "d"],
        ["e"],
      ])
      expect(pages.map((page) => page.listComplete)).toEqual([false, false, true])

      const all = pages.flatMap((page) => page.keys.map((key) => key.name))
      expect(new Set(all).size).toBe(all.length)
    })

    it("listPages issues no further calls when iteration stops", async () => {
      const list = vi.spyOn(ns, "list")

      for await (const page of store.listPages({ limit: 2 })) {
        expect(page.keys).toHaveLength(2)
        break
      }

      expect(list).toHaveBeenCalledOnce()
    })

    it("listPages honours the prefix and decodes metadata", async () => {
      await store.put("user:1", "x").metadata({ role: "admin" }).execute()
      await store.put("user:2", "x").metadata({ role: "viewer" }).execute()

      const role = z.object({ role: z.enum(["admin", "viewer"]) })
      const roles: string[] = []

      for await (const page of store.listPages({ prefix: "user:" }, role)) {
        for (const key of page.keys) {
          if (key.metadata) roles.push(key.metadata.role)
        }
      }

      expect(roles).toEqual(["admin", "viewer"])
    })

    it("surfaces the host's page-size limit", async () => {
      await expect(store.list().limit(1001).execute()).rejects.toThrow(
        "Invalid list limit of 1001; must be between 1 and 1000",
      )
    })
  })

  it("applies the store cache ttl to reads", async () => {
    const cached = KvStore.open({ KV: ns }, "KV", { clock }, { cacheTtl: 120 })
    const get = vi.spyOn(ns, "get")

    await cached.get(keys.one()).execute()
    await cached.get(keys.two()).cacheTtl(300).execute()

    expect(get).toHaveBeenNthCalledWith(1, keys.one(), { type: "text", cacheTtl: 120 })
    expect(get).toHaveBeenNthCalledWith(2, keys.two(), { type: "text", cacheTtl: 300 })
  })

  it("builders are independent", async () => {
    const first = store.put(keys.one(), "v1")
    const second = store.put(keys.one(), "v2")

    await first.execute()
    await second.execute()

    expect(first.isExecuted).toBe(true)
    await expect(store.get(keys.one()).execute()).resolves.toStrictEqual({
      kind: "found",
      value: "v2",
    })
  })
})
