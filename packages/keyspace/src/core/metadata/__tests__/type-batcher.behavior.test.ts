import { mock } from "vitest-mock-extended"
import type { KeyspaceDataSource } from "../../../ports/data-source"
import type { KeyType } from "../../../ports/key-type"
import type { Mock } from "../../../tests/mock"
import { ResolutionError, TransportError } from "../../errors/keyspace-errors"
import { TypeBatcher } from "../type-batcher"

type TypeSource = Pick<KeyspaceDataSource, "typeOfMany">

describe("TypeBatcher behavior", () => {
  let source: Mock<TypeSource>

  beforeEach(() => {
    source = mock<TypeSource>()
    source.typeOfMany.mockImplementation(async (keys) => keys.map((key): KeyType => (key.startsWith("h") ? "hash" : "string")))
  })

  it("resolves nothing for no keys", async () => {
    const types = await new TypeBatcher({ source }).resolveTypes([])

    expect(types.size).toBe(0)
    expect(source.typeOfMany).not.toHaveBeenCalled()
  })

  it("splits keys into batches of batchSize", async () => {
    const batcher = new TypeBatcher({ source }, { batchSize: 2 })

    const types = await batcher.resolveTypes(["h:1", "s:1", "h:2", "s:2", "h:3"])

    expect(source.typeOfMany.mock.calls.map(([keys]) => keys)).toEqual([["h:1", "s:1"], ["h:2", "s:2"], ["h:3"]])
    expect([...types]).toEqual([
      ["h:1", "hash"],
      ["s:1", "string"],
      ["h:2", "hash"],
      ["s:2", "string"],
      ["h:3", "hash"],
    ])
  })

  it("looks each distinct key up once", async () => {
    await new TypeBatcher({ source }).resolveTypes(["a", "b", "a", "b"])

    expect(source.typeOfMany).toHaveBeenCalledTimes(1)
    expect(source.typeOfMany).toHaveBeenCalledWith(["a", "b"])
  })

  it("wraps a plain failure of a batch in ResolutionError", async () => {
    const cause = new Error("pipeline reply error")
    source.typeOfMany.mockRejectedValueOnce(cause)

    const err = await new TypeBatcher({ source }).resolveTypes(["a", "b"]).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ResolutionError)
    expect(err).toMatchObject({ code: "resolution_failure", context: { keys: ["a", "b"] }, cause })
  })

  it("passes domain errors from the source through", async () => {
    const transport = TransportError.fromCause("TYPE pipeline", new Error("socket closed"))
    source.typeOfMany.mockRejectedValueOnce(transport)

    await expect(new TypeBatcher({ source }).resolveTypes(["a"])).rejects.toBe(transport)
  })

  it("rejects when the source answers for fewer keys than asked", async () => {
    source.typeOfMany.mockResolvedValueOnce(["string"])

    await expect(new TypeBatcher({ source }).resolveTypes(["a", "b"])).rejects.toBeInstanceOf(ResolutionError)
  })

  it("does not keep partial results when a later batch fails", async () => {
    source.typeOfMany.mockResolvedValueOnce(["string"]).mockRejectedValueOnce(new Error("boom"))
    const batcher = new TypeBatcher({ source }, { batchSize: 1 })

    await expect(batcher.resolveTypes(["a", "b"])).rejects.toThrow("Could not resolve the type of 1 key(s)")
  })

  it("rejects a non-positive batch size", () => {
    expect(() => new TypeBatcher({ source }, { batchSize: 0 })).toThrow("batchSize must be a positive integer")
  })
})
