import { Command } from "commander"
import { InvalidKeyError } from "../../core/errors"
import { MapSource } from "../map/map-source"

/**
 * Properties given on the command line as `-P key=value` or `--property key=value`.
 * Other arguments are ignored; the last occurrence of a key wins.
 */
export class ArgsSource extends MapSource {
  constructor(argv: readonly string[] = process.argv.slice(2)) {
    super("args", parseProperties(argv))
  }
}

const collect = (value: string, previous: string[]): string[] => [...previous, value]

export function parseProperties(argv: readonly string[]): [string, string][] {
  const program = new Command()
    .option("-P, --property <key=value>", "set a configuration property", collect, [])
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} })
    .exitOverride((err) => {
      throw new InvalidKeyError("--property", err.message)
    })

  program.parse([...argv], { from: "user" })

  const { property } = program.opts<{ property: string[] }>()

  return property.map((item) => {
    const eq = item.indexOf("=")
    if (eq <= 0) throw new InvalidKeyError(item, "expected key=value")

    return [item.slice(0, eq).trim(), item.slice(eq + 1)]
  })
}
