import { InvalidKeyError } from "../../core/errors"
import { fromEnvVar, isPrefixOf, keyEquals, toEnvVar } from "../../core/key"
import type { Key } from "../../ports/key"
import type { PropertySource } from "../../ports/property-source"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix are visible, with the prefix stripped.
   *
   * @example "APP_" makes `APP_SERVER_PORT` available as `server.port`
   */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /**
   * - `live`: every lookup reads the current value of `env`
   * - `snapshot`: values are copied once on construction
   *
   * @default "live"
   */
  mode?: "live" | "snapshot"
}

/**
 * Environment variables as properties. `SERVER_PORT` ↔ `server.port`,
 * `POOL_MAX__IDLE` ↔ `pool.max_idle`, `SERVERS_0_HOST` ↔ `servers[0].host`.
 *
 * Variables whose names do not map to a key (`_X`, `A___`, `PATH-ish.names`) are ignored.
 */
export class EnvSource implements PropertySource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    const env = options.env ?? process.env

    this.prefix = options.prefix ?? ""
    this.env = options.mode === "snapshot" ? { ...env } : env
  }

  get(key: Key): string | undefined {
    if (!key.length) return undefined

    const exact = this.env[this.prefix + toEnvVar(key)]
    if (exact !== undefined) return exact

    for (const [name, value] of this.entries()) {
      if (keyEquals(name, key)) return value
    }

    return undefined
  }

  keys(prefix: Key): Key[] {
    const out: Key[] = []

    for (const [key] of this.entries()) {
      if (isPrefixOf(prefix, key)) out.push(key)
    }

    return out
  }

  private *entries(): Generator<[Key, string]> {
    for (const [name, value] of Object.entries(this.env)) {
      if (value === undefined || !name.startsWith(this.prefix)) continue

      const key = tryFromEnvVar(name.slice(this.prefix.length))
      if (key?.length) yield [key, value]
    }
  }
}

function tryFromEnvVar(name: string): Key | undefined {
  try {
    return fromEnvVar(name)
  } catch (err) {
    if (err instanceof InvalidKeyError) return undefined
    throw err
  }
}
