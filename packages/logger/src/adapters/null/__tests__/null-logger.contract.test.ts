import { createNullLogger } from "../null-logger"

describe("null logger", () => {
  it("accepts every level", () => {
    const logger = createNullLogger()

    expect(() => {
      logger.trace("x")
      logger.debug("x")
      logger.info("x", { key: "a.b" })
      logger.warn("x")
      logger.error("x", { err: new Error("boom") })
      logger.fatal("x")
    }).not.toThrow()
  })

  it("child() returns another discarding logger", () => {
    const child = createNullLogger().child({ component: "environment" })

    expect(Object.isFrozen(child)).toBe(true)
    expect(() => child.child({ source: "env" }).info("x")).not.toThrow()
  })
})
