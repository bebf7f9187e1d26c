import { InvalidKeyError } from "../../../core/errors"
import { parseKey, toDotted } from "../../../core/key"
import { MapSource } from "../map-source"

describe("MapSource behavior", () => {
  it("normalizes keys on construction", () => {
    const source = new MapSource("test", { "Server.Hosts.0": "a", "server.hosts[1]": "b" })

    expect(source.get(parseKey("server.hosts[0]"))).toBe("a")
    expect(source.get(parseKey("SERVER.HOSTS.1"))).toBe("b")
    expect(source.size).toBe(2)
  })

  it("accepts entries as key/value pairs, the last one winning", () => {
    const entries: [string | string[], string | number][] = [
      ["a.b", "1"],
      [["a", "c"], 2],
      ["a.b", "3"],
    ]
    const source = new MapSource("test", entries)

    expect(source.toRecord()).toEqual({ "a.b": "3", "a.c": "2" })
  })

  it("stores empty strings as values", () => {
    const source = new MapSource("test", { "a.b": "" })

    expect(source.get(parseKey("a.b"))).toBe("")
  })

  it("enumerates keys at and under the prefix", () => {
    const source = new MapSource("test", { a: "0", "a.b": "1", "a.c[0]": "2", ab: "3" })

    expect(source.keys(parseKey("a")).map(toDotted).sort()).toEqual(["a", "a.b", "a.c[0]"])
  })

  it("rejects invalid keys", () => {
    expect(() => new MapSource("test", { "a..b": "x" })).toThrow(InvalidKeyError)
  })
})
