import { isPrefixOf, keyOf, toDotted } from "../../core/key"
import type { Key } from "../../ports/key"
import type { PropertySource } from "../../ports/property-source"

export type PropertyValue = string | number | boolean

export type MapSourceEntries =
  | Readonly<Record<string, PropertyValue>>
  | Iterable<readonly [string | Key, PropertyValue]>

type Entry = { key: Key; value: string }

/**
 * Static, in-memory source. Keys are normalized on construction so lookups are
 * insensitive to the spelling they were given in (`A.B`, `a.b`, `a[0]`, `a.0`).
 */
export class MapSource implements PropertySource {
  private readonly entries = new Map<string, Entry>()

  constructor(
    readonly name: string,
    entries: MapSourceEntries = {},
  ) {
    const pairs = isIterable(entries) ? entries : Object.entries(entries)

    for (const [raw, value] of pairs) {
      const key = keyOf(raw)
      this.entries.set(toDotted(key), { key, value: String(value) })
    }
  }

  get size(): number {
    return this.entries.size
  }

  get(key: Key): string | undefined {
    return this.entries.get(toDotted(key))?.value
  }

  keys(prefix: Key): Key[] {
    const out: Key[] = []

    for (const { key } of this.entries.values()) {
      if (isPrefixOf(prefix, key)) out.push(key)
    }

    return out
  }

  /**
   * Snapshot of the stored values keyed by canonical dotted key.
   */
  toRecord(): Record<string, string> {
    const out: Record<string, string> = {}

    for (const [dotted, { value }] of this.entries) out[dotted] = value

    return out
  }
}

function isIterable(
  value: MapSourceEntries,
): value is Iterable<readonly [string | Key, PropertyValue]> {
  return Symbol.iterator in value
}
