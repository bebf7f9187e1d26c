import path from "node:path"
import { createNullLogger, type Logger } from "@stratum/logger"
import { ArgsSource } from "../adapters/args/args-source"
import { loadDotenvSource } from "../adapters/dotenv/dotenv-source"
import { EnvSource, type EnvSourceOptions } from "../adapters/env/env-source"
import { loadJsonSource } from "../adapters/json/json-source"
import { MapSource, type PropertyValue } from "../adapters/map/map-source"
import { RandomSource } from "../adapters/random/random-source"
import { Environment, type EnvironmentBuilder, SourcePriority } from "./environment"

export const APP_CONF_NAME = "app.conf.name"
export const APP_CONF_DIR = "app.conf.dir"
export const APP_PROFILE = "app.profile"

export type LoadEnvironmentOptions = {
  /** Highest-priority values, as with `EnvironmentBuilder.set` */
  overrides?: Readonly<Record<string, PropertyValue>>

  /** @default process.argv.slice(2) */
  argv?: readonly string[]

  /** @default process.env */
  env?: EnvSourceOptions["env"]
  envPrefix?: string
  envMode?: EnvSourceOptions["mode"]

  /** Lowest-priority values */
  defaults?: Readonly<Record<string, PropertyValue>>

  /** File base name when `app.conf.name` is not set. @default "app" */
  name?: string
  /** Directory of the files when `app.conf.dir` is not set. @default cwd */
  dir?: string
  /** Profile when `app.profile` is not set */
  profile?: string

  /** @default process.cwd() */
  cwd?: string

  /**
   * Register `random.*` keys.
   * @default true
   */
  random?: boolean

  /** @default true */
  placeholders?: boolean

  logger?: Logger
}

/**
 * Build the conventional stack, highest priority first:
 *
 * 1. `overrides`
 * 2. `-P key=value` arguments
 * 3. environment variables
 * 4. `<name>-<profile>.json`, `.env.<profile>`, then `<name>.json`, `.env`
 * 5. `random.*` and `defaults`
 *
 * `app.conf.name`, `app.conf.dir` and `app.profile` are read from layers 1-3 and 5
 * before any file is opened.
 */
export async function loadEnvironment(options: LoadEnvironmentOptions = {}): Promise<Environment> {
  const logger = options.logger ?? createNullLogger()
  const log = logger.child({ component: "loader" })

  const args = new ArgsSource(options.argv ?? process.argv.slice(2))
  const env = new EnvSource({
    ...(options.env && { env: options.env }),
    ...(options.envPrefix !== undefined && { prefix: options.envPrefix }),
    ...(options.envMode && { mode: options.envMode }),
  })
  const defaults = new MapSource("defaults", options.defaults ?? {})

  const assemble = (files: readonly MapSource[], extra?: MapSource): EnvironmentBuilder => {
    const builder = Environment.builder()

    if (extra) builder.withLogger(logger)

    builder
      .withPlaceholders(options.placeholders ?? true)
      .addSource(args, { priority: SourcePriority.Args })
      .addSource(env, { priority: SourcePriority.Env })
      .addSources(files, { priority: SourcePriority.File })

    if (options.random ?? true) builder.addSource(new RandomSource())
    builder.addSource(defaults)
    if (extra) builder.addSource(extra)

    for (const [key, value] of Object.entries(options.overrides ?? {})) builder.set(key, value)

    return builder
  }

  const bootstrap = assemble([]).build()

  const name = bootstrap.get(APP_CONF_NAME) || options.name || "app"
  const dir = path.resolve(
    options.cwd ?? process.cwd(),
    bootstrap.get(APP_CONF_DIR) || options.dir || ".",
  )
  const profile = bootstrap.get(APP_PROFILE) || options.profile || undefined

  const candidates = [
    ...(profile ? [`${name}-${profile}.json`, `.env.${profile}`] : []),
    `${name}.json`,
    ".env",
  ]

  const files: MapSource[] = []

  for (const file of candidates) {
    const opts = { file, required: false, cwd: dir }
    const source = file.endsWith(".json") ? await loadJsonSource(opts) : await loadDotenvSource(opts)

    if (!source.size) continue

    files.push(source)
    log.info("Loaded configuration file", {
      source: source.name,
      file: path.join(dir, file),
      ...(profile !== undefined && { profile }),
    })
  }

  const resolved = new MapSource("loader", {
    [APP_CONF_NAME]: name,
    [APP_CONF_DIR]: dir,
    ...(profile !== undefined && { [APP_PROFILE]: profile }),
  })

  return assemble(files, resolved).build()
}
