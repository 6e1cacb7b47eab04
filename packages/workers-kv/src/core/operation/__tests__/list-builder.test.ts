import { z } from "zod"
import { type OperationHarness, operationHarness } from "../../../tests/utils/kv-test-helpers"
import { ConfigurationError, DeserializationError, HostError } from "../../errors/kv-errors"
import { passthrough } from "../../format/formats"
import { ListBuilder } from "../list-builder"

describe("ListBuilder", () => {
  let h: OperationHarness

  beforeEach(() => {
    h = operationHarness()
  })

  it("lists with no options", async () => {
    h.binding.list.mockResolvedValue({ keys: [{ name: "a" }, { name: "b" }], list_complete: true })

    const res = await new ListBuilder(h.deps, passthrough).execute()

    expect(h.binding.list).toHaveBeenCalledWith({})
    expect(res).toStrictEqual({
      keys: [{ name: "a" }, { name: "b" }],
      listComplete: true,
      cursor: null,
    })
  })

  it("forwards prefix, limit and cursor", async () => {
    h.binding.list.mockResolvedValue({ keys: [], list_complete: true })

    await new ListBuilder(h.deps, passthrough).prefix("user:").limit(50).cursor("c-1").execute()

    expect(h.binding.list).toHaveBeenCalledWith({ prefix: "user:", limit: 50, cursor: "c-1" })
  })

  it("omits an empty cursor", async () => {
    h.binding.list.mockResolvedValue({ keys: [], list_complete: true })

    await new ListBuilder(h.deps, passthrough).cursor("").execute()

    expect(h.binding.list).toHaveBeenCalledWith({})
  })

  it("returns the cursor of an incomplete page", async () => {
    h.binding.list.mockResolvedValue({
      keys: [{ name: "a" }],
      list_complete: false,
      cursor: "c-2",
    })

    const res = await new ListBuilder(h.deps, passthrough).limit(1).execute()

    expect(res).toStrictEqual({ keys: [{ name: "a" }], listComplete: false, cursor: "c-2" })
  })

  it("drops the cursor once the listing is complete", async () => {
    h.binding.list.mockResolvedValue({ keys: [{ name: "a" }], list_complete: true, cursor: "" })

    const res = await new ListBuilder(h.deps, passthrough).execute()

    expect(res.cursor).toBeNull()
  })

  it("keeps expiration and decodes metadata", async () => {
    h.binding.list.mockResolvedValue({
      keys: [
        { name: "c", metadata: { owner: "u-1" } },
        { name: "d", expiration: 1_704_070_800, metadata: { owner: "u-2" } },
        { name: "e", metadata: null },
      ],
      list_complete: true,
    })
    const owner = z.object({ owner: z.string() })

    const res = await new ListBuilder(h.deps, owner).execute()

    expect(res.keys).toStrictEqual([
      { name: "c", metadata: { owner: "u-1" } },
      { name: "d", expiration: 1_704_070_800, metadata: { owner: "u-2" } },
      { name: "e" },
    ])
  })

  it("reports metadata the decoder rejects", async () => {
    h.binding.list.mockResolvedValue({
      keys: [{ name: "c", metadata: 10 }],
      list_complete: true,
    })

    await expect(
      new ListBuilder(h.deps, z.object({ owner: z.string() })).execute(),
    ).rejects.toThrow(/^Metadata for "c" could not be decoded: /)
  })

  describe("response validation", () => {
    it.each([
      ["a string", "nope"],
      ["missing keys", { list_complete: true }],
      ["a key without a name", { keys: [{ expiration: 1 }], list_complete: true }],
      ["an incomplete page without a cursor", { keys: [{ name: "a" }], list_complete: false }],
    ])("rejects %s", async (_label, response) => {
      h.binding.list.mockResolvedValue(response)

      const err = await new ListBuilder(h.deps, passthrough).execute().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(DeserializationError)
      if (err instanceof DeserializationError) {
        expect(err.message.startsWith("Unexpected list response from host: ")).toBe(true)
      }
    })
  })

  describe("limit", () => {
    it.each([0, -1, 2.5])("rejects %s without calling the host", async (limit) => {
      await expect(
        new ListBuilder(h.deps, passthrough).limit(limit).execute(),
      ).rejects.toBeInstanceOf(ConfigurationError)
      expect(h.binding.list).not.toHaveBeenCalled()
    })

    it("leaves the upper bound to the host", async () => {
      h.binding.list.mockRejectedValue(new Error("Invalid key_count_limit of 5000"))

      const err = await new ListBuilder(h.deps, passthrough)
        .prefix("user:")
        .limit(5000)
        .execute()
        .catch((e: unknown) => e)

      expect(h.binding.list).toHaveBeenCalledWith({ prefix: "user:", limit: 5000 })
      expect(err).toBeInstanceOf(HostError)
      if (err instanceof HostError) {
        expect(err.message).toBe("Invalid key_count_limit of 5000")
        expect(err.context).toEqual({ operation: "list", prefix: "user:" })
      }
    })
  })
})
