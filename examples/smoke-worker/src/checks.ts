import { type KvStore, formats } from "@kvbridge/workers-kv"
import { z } from "zod"

export const PASSED = "passed"

/** Seeded by the deployment; `/get` returns whatever it holds. */
export const SEEDED_KEY = "simple"

export class SmokeCheckFailure extends Error {
  override readonly name = "SmokeCheckFailure"
}

export type SmokeCheck = (store: KvStore) => Promise<string>

export const getSeeded: SmokeCheck = async (store) => {
  const res = await store.get(SEEDED_KEY).execute()

  if (res.kind === "not_found") throw new SmokeCheckFailure("no value found")

  return res.value
}

export const getNotFound: SmokeCheck = async (store) => {
  const res = await store.get("not_found").execute()

  if (res.kind === "found") throw new SmokeCheckFailure("unexpected value present")

  return PASSED
}

export const listKeys: SmokeCheck = async (store) => {
  const expected = ["list:a", "list:b", "list:c"]

  for (const name of expected) {
    await store.put(name, name).execute()
  }

  const seen: string[] = []
  for await (const page of store.listPages({ prefix: "list:", limit: 2 })) {
    seen.push(...page.keys.map((key) => key.name))
  }

  if (seen.join(",") !== expected.join(",")) {
    throw new SmokeCheckFailure(`listed ${seen.join(",") || "nothing"}`)
  }

  return PASSED
}

export const putSimple: SmokeCheck = async (store) => {
  await store.put("put_a", "test").execute()

  const res = await store.get("put_a").execute()

  if (res.kind !== "found" || res.value !== "test") {
    throw new SmokeCheckFailure("put_a had unexpected value")
  }

  return PASSED
}

export const putMetadata: SmokeCheck = async (store) => {
  await store.put("put_b", "test").metadata(100).execute()

  const res = await store.getWithMetadata("put_b", formats.text, z.number()).execute()

  if (res.kind !== "found" || res.value !== "test") {
    throw new SmokeCheckFailure("put_b had unexpected value")
  }

  if (res.metadata !== 100) throw new SmokeCheckFailure("put_b had unexpected metadata")

  return PASSED
}

export const putExpiration: SmokeCheck = async (store) => {
  await store.put("put_c", "test").expirationTtl(10 * 60).execute()

  const page = await store.list().prefix("put_c").execute()
  const key = page.keys.find((candidate) => candidate.name === "put_c")

  if (!key) throw new SmokeCheckFailure("put_c not listed")
  if (key.expiration === undefined) {
    throw new SmokeCheckFailure("expected expiration timestamp not found")
  }

  return PASSED
}

export const smokeChecks = {
  "/get": getSeeded,
  "/get-not-found": getNotFound,
  "/list-keys": listKeys,
  "/put-simple": putSimple,
  "/put-metadata": putMetadata,
  "/put-expiration": putExpiration,
} satisfies Record<string, SmokeCheck>
