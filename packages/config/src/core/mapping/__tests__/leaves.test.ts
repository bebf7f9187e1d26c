import { z } from "zod"
import { MapSource } from "../../../adapters/map/map-source"
import type { Mapper } from "../../../ports/mapper"
import { Environment } from "../../environment"
import { NotFoundError, ParseError, UnknownVariantError } from "../../errors"
import { RandomSource } from "../../../adapters/random/random-source"
import { bigint, bool, duration, enumeration, float, int, leaf, schema, string } from "../leaves"

function mapValue<T>(mapper: Mapper<T>, value: string | undefined): T {
  const values: Record<string, string> = value === undefined ? {} : { "app.value": value }
  const env = Environment.builder().addSource(new MapSource("test", values)).build()

  return env.map(mapper, "app.value")
}

describe("leaf mappers", () => {
  it("string() keeps empty values and fails when absent", () => {
    expect(mapValue(string(), "text")).toBe("text")
    expect(mapValue(string(), "")).toBe("")
    expect(() => mapValue(string(), undefined)).toThrow(
      expect.objectContaining({ code: "not_found", context: { key: "app.value" } }),
    )
  })

  it("treats an empty string as absent for other leaves", () => {
    expect(() => mapValue(int(), "")).toThrow(NotFoundError)
    expect(() => mapValue(bool(), "")).toThrow(NotFoundError)
  })

  it.each([
    ["42", 42],
    ["-7", -7],
    ["+3", 3],
    ["007", 7],
  ])("int() parses %j", (text, expected) => {
    expect(mapValue(int(), text)).toBe(expected)
  })

  it.each(["4.2", "0x10", "1e3", " 1", "abc", "99999999999999999999"])(
    "int() rejects %j",
    (text) => {
      expect(() => mapValue(int(), text)).toThrow(
        expect.objectContaining({
          code: "parse_error",
          context: { key: "app.value", value: text, type: "int" },
        }),
      )
    },
  )

  it("int() reads negative zero as zero", () => {
    expect(mapValue(int(), "-0")).toBe(0)
  })

  it("int() enforces a declared range", () => {
    const u8 = int({ min: 0, max: 255 })

    expect(mapValue(u8, "255")).toBe(255)
    expect(() => mapValue(u8, "256")).toThrow(
      expect.objectContaining({
        code: "parse_error",
        context: { key: "app.value", value: "256", type: "int[0..255]" },
      }),
    )
    expect(() => mapValue(u8, "-1")).toThrow(ParseError)
  })

  it("bigint() keeps integers beyond the safe range exact", () => {
    expect(mapValue(bigint(), "9007199254740993")).toBe(9_007_199_254_740_993n)
    expect(mapValue(bigint(), "-42")).toBe(-42n)
  })

  it.each(["1.5", "1e3", "abc"])("bigint() rejects %j", (text) => {
    expect(() => mapValue(bigint(), text)).toThrow(
      expect.objectContaining({ context: { key: "app.value", value: text, type: "bigint" } }),
    )
  })

  it("bigint() enforces a declared range", () => {
    const u64 = bigint({ min: 0n, max: 2n ** 64n - 1n })

    expect(mapValue(u64, "18446744073709551615")).toBe(18_446_744_073_709_551_615n)
    expect(() => mapValue(u64, "18446744073709551616")).toThrow(ParseError)
    expect(() => mapValue(u64, "-1")).toThrow(ParseError)
  })

  it("bigint() maps random 64-bit values", () => {
    const env = Environment.builder()
      .addSource(new RandomSource())
      .set("snowflake", "${random.i64}")
      .build()

    for (let i = 0; i < 20; i++) {
      const value = env.map(bigint({ min: -(2n ** 63n), max: 2n ** 63n - 1n }), "snowflake")

      expect(typeof value).toBe("bigint")
    }
  })

  it.each([
    ["0.5", 0.5],
    ["-1e3", -1000],
    [".5", 0.5],
    ["5.", 5],
    ["12", 12],
  ])("float() parses %j", (text, expected) => {
    expect(mapValue(float(), text)).toBe(expected)
  })

  it.each(["abc", "Infinity", "1/2", "0x1"])("float() rejects %j", (text) => {
    expect(() => mapValue(float(), text)).toThrow(ParseError)
  })

  it.each(["true", "T", "yes", "Y", "on", "1", "TRUE"])("bool() reads %j as true", (text) => {
    expect(mapValue(bool(), text)).toBe(true)
  })

  it.each(["false", "f", "No", "n", "OFF", "0"])("bool() reads %j as false", (text) => {
    expect(mapValue(bool(), text)).toBe(false)
  })

  it("bool() rejects other words", () => {
    expect(() => mapValue(bool(), "maybe")).toThrow(ParseError)
  })

  it.each([
    ["1h", 3_600_000],
    ["10m", 600_000],
    ["30s", 30_000],
    ["250ms", 250],
    ["5", 5000],
    ["1.5s", 1500],
  ])("duration() reads %j as %d ms", (text, expected) => {
    expect(mapValue(duration(), text)).toBe(expected)
  })

  it("duration() reads sub-millisecond units", () => {
    expect(mapValue(duration(), "1500us")).toBeCloseTo(1.5)
    expect(mapValue(duration(), "2000000ns")).toBeCloseTo(2)
  })

  it.each(["10x", "h", "-1s", "1 h"])("duration() rejects %j", (text) => {
    expect(() => mapValue(duration(), text)).toThrow(ParseError)
  })

  it("enumeration() matches case-insensitively and returns the declared variant", () => {
    const level = enumeration(["debug", "info", "Warn"])

    expect(mapValue(level, "INFO")).toBe("info")
    expect(mapValue(level, "warn")).toBe("Warn")
  })

  it("enumeration() lists the variants on failure", () => {
    const level = enumeration(["debug", "info"])

    expect(() => mapValue(level, "trace")).toThrow(UnknownVariantError)
    expect(() => mapValue(level, "trace")).toThrow(
      expect.objectContaining({
        context: { key: "app.value", value: "trace", variants: ["debug", "info"] },
      }),
    )
  })

  it("schema() delegates to a zod schema", () => {
    const port = schema(z.coerce.number().int().min(1).max(65535), "port")

    expect(mapValue(port, "8080")).toBe(8080)

    try {
      mapValue(port, "0")
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError)
      expect(err).toMatchObject({ context: { key: "app.value", value: "0", type: "port" } })
      expect(err).toHaveProperty("cause.issues")
    }
  })

  it("leaf() wraps custom parsers", () => {
    const list = leaf({
      typeName: "csv",
      acceptsEmpty: true,
      parse: (text) => (text ? text.split(",") : []),
    })

    expect(mapValue(list, "a,b")).toEqual(["a", "b"])
    expect(mapValue(list, "")).toEqual([])
  })

  it("describes itself", () => {
    const env = Environment.builder().build()

    expect(env.describe(int(), "server.port")).toEqual([
      { key: "server.port", type: "int", required: true },
    ])
  })
})
