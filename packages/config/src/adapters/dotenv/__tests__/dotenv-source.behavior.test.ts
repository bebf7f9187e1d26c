import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { SourceLoadError } from "../../../core/errors"
import { loadDotenvSource } from "../dotenv-source"

describe("loadDotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("normalizes variable names into keys", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "SERVER_PORT=3000\nPOOL_MAX__IDLE=5\nSERVERS_0_HOST=a\nserver.name=demo",
    )

    const source = await loadDotenvSource({ file: ".env", required: true, cwd })

    expect(source.name).toBe("dotenv:.env")
    expect(source.toRecord()).toEqual({
      "server.port": "3000",
      "pool.max_idle": "5",
      "servers[0].host": "a",
      "server.name": "demo",
    })
  })

  it("handles quoted values and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      `# comment\nSINGLE='single quoted'\nDOUBLE="double quoted"\nUNQUOTED=no quotes`,
    )

    const source = await loadDotenvSource({ file: ".env", required: true, cwd })

    expect(source.toRecord()).toEqual({
      single: "single quoted",
      double: "double quoted",
      unquoted: "no quotes",
    })
  })

  it("returns an empty source when the file is missing and not required", async () => {
    const source = await loadDotenvSource({ file: ".env", required: false, cwd })

    expect(source.size).toBe(0)
  })

  it("rejects with SourceLoadError when the file is missing and required", async () => {
    const load = loadDotenvSource({ file: ".env", required: true, cwd })

    await expect(load).rejects.toThrow(SourceLoadError)
    await expect(load).rejects.toMatchObject({
      code: "source_load_failed",
      context: { source: "dotenv", file: ".env" },
    })
  })

  it("rejects names that are neither variables nor keys", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "BAD..NAME=1")

    await expect(loadDotenvSource({ file: ".env", required: true, cwd })).rejects.toThrow(
      SourceLoadError,
    )
  })

  it("resolves the path relative to cwd", async () => {
    const subdir = path.join(cwd, "config")
    await fs.mkdir(subdir)
    await fs.writeFile(path.join(subdir, ".env.dev"), "KEY=value")

    const source = await loadDotenvSource({ file: ".env.dev", required: true, cwd: subdir })

    expect(source.toRecord()).toEqual({ key: "value" })
  })
})
