import { ConsoleLogger, type ConsoleWriter, createConsoleLogger } from "../console-logger"

type Method = keyof ConsoleWriter

function makeLineCaptureConsole() {
  const lines: string[] = []
  const calls: { method: Method; line: string }[] = []

  const capture = (method: Method) => (line: unknown) => {
    const text = String(line)
    lines.push(text)
    calls.push({ method, line: text })
  }

  const fakeConsole: ConsoleWriter = {
    debug: capture("debug"),
    info: capture("info"),
    warn: capture("warn"),
    error: capture("error"),
  }

  const json = (index: number): Record<string, unknown> => JSON.parse(lines[index] ?? "null")

  return { lines, calls, json, fakeConsole }
}

describe("ConsoleLogger behavior", () => {
  it("defaults to the global console when no override is provided", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {})

    new ConsoleLogger({}, { level: "trace" }, { component: "loader" }).info("hello")

    expect(info).toHaveBeenCalledTimes(1)
    expect(JSON.parse(String(info.mock.calls[0]?.[0]))).toMatchObject({
      level: "info",
      message: "hello",
      component: "loader",
    })
  })

  it("emits parseable JSON when prettify is off", () => {
    const { lines, json, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" }, { source: "env" })

    logger.info("hello", { key: "server.port" })

    expect(lines).toHaveLength(1)
    expect(json(0)).toMatchObject({
      level: "info",
      message: "hello",
      source: "env",
      key: "server.port",
    })
    expect(typeof json(0).timestamp).toBe("string")
  })

  it("prettify emits `<time> <LEVEL> <message> <extra>`", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { prettify: true }, { source: "env" })

    logger.warn("hello")

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ WARN hello \{"source":"env"\}$/)
  })

  it("prettify without extra fields has no tail", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    new ConsoleLogger({ console: fakeConsole }, { prettify: true }).info("plain")

    expect(lines[0]).toMatch(/^\S+ INFO plain$/)
  })

  it("defaults to info level", () => {
    const { json, lines, fakeConsole } = makeLineCaptureConsole()

    const logger = createConsoleLogger({ console: fakeConsole })

    logger.debug("ignored")
    logger.info("included")

    expect(lines).toHaveLength(1)
    expect(json(0).message).toBe("included")
  })

  it("routes trace/debug to console.debug and fatal to console.error", () => {
    const { calls, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.trace("t")
    logger.debug("d")
    logger.fatal("f")

    expect(calls.map((c) => c.method)).toEqual(["debug", "debug", "error"])
  })

  it("serializes Error values with their cause", () => {
    const { json, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.error("failed", { err: new Error("boom", { cause: new Error("root") }) })
    logger.error("failed-again", { err: { code: "E_CUSTOM" } })
    logger.error("null-error", { err: null })

    expect(json(0).err).toMatchObject({
      name: "Error",
      message: "boom",
      cause: { name: "Error", message: "root" },
    })
    expect(json(1).err).toEqual({ code: "E_CUSTOM" })
    expect(json(2).err).toBeNull()
  })

  it("does not throw when metadata cannot be serialized", () => {
    const { json, lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    const circular: Record<string, unknown> = { a: 1 }
    circular.self = circular

    logger.info("circular", { circular })

    expect(lines).toHaveLength(1)
    expect(json(0)).toEqual({ message: "Failed to stringify log payload" })
  })

  it("ignores metadata fields that collide with reserved keys", () => {
    const { json, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.info("real", { level: 456, message: "fake" })

    expect(json(0).level).toBe("info")
    expect(json(0).message).toBe("real")
  })

  it("drops undefined metadata fields", () => {
    const { json, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.info("hello", { a: undefined, b: 1 })

    expect(json(0).b).toBe(1)
    expect(Object.hasOwn(json(0), "a")).toBe(false)
  })
})
