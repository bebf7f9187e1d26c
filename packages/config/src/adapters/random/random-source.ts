import { randomBytes } from "node:crypto"
import { isPrefixOf, keyEquals } from "../../core/key"
import type { Key } from "../../ports/key"
import type { PropertySource } from "../../ports/property-source"

type Draw = (bytes: Buffer) => string

const GENERATORS = {
  u8: (b) => String(b.readUInt8(0)),
  u16: (b) => String(b.readUInt16BE(0)),
  u32: (b) => String(b.readUInt32BE(0)),
  i8: (b) => String(b.readInt8(0)),
  i16: (b) => String(b.readInt16BE(0)),
  i32: (b) => String(b.readInt32BE(0)),
  i64: (b) => b.readBigInt64BE(0).toString(),
} satisfies Record<string, Draw>

export type RandomKind = keyof typeof GENERATORS

export const randomKinds = Object.freeze(["u8", "u16", "u32", "i8", "i16", "i32", "i64"] as const)

/**
 * `random.u8` … `random.i64`: a fresh random integer of that range on every read.
 * Handy as a placeholder target, e.g. `server.port = ${random.u16}`.
 */
export class RandomSource implements PropertySource {
  readonly name = "random"

  get(key: Key): string | undefined {
    const kind = randomKinds.find((k) => keyEquals(key, ["random", k]))
    if (!kind) return undefined

    return GENERATORS[kind](randomBytes(8))
  }

  keys(prefix: Key): Key[] {
    return randomKinds
      .map((kind): Key => ["random", kind])
      .filter((key) => isPrefixOf(prefix, key))
  }
}
