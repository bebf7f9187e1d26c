import type { Key, KeySegment } from "../ports/key"
import { InvalidKeyError } from "./errors"

const NAME = /^[a-z0-9][a-z0-9_-]*$/
const DIGITS = /^\d+$/

function toIndex(raw: string, text: string): number {
  const index = Number(text)

  if (!Number.isSafeInteger(index)) {
    throw new InvalidKeyError(raw, `index "${text}" is out of range`)
  }

  return index
}

function toSegment(raw: string, token: string): KeySegment {
  if (DIGITS.test(token)) return toIndex(raw, token)

  const name = token.toLowerCase()

  if (!NAME.test(name)) {
    throw new InvalidKeyError(raw, `illegal characters in segment "${token}"`)
  }

  return name
}

/**
 * Parse a dotted key such as `servers[0].host` or `servers.0.host`.
 *
 * Names are lowercased; all-digit segments become indices. The empty string is the root key.
 */
export function parseKey(raw: string): Key {
  const segments: KeySegment[] = []
  if (raw === "") return segments

  let pos = 0

  while (pos <= raw.length) {
    let end = pos
    while (end < raw.length && raw[end] !== "." && raw[end] !== "[") end++

    const token = raw.slice(pos, end)

    if (token) segments.push(toSegment(raw, token))
    else if (!(pos === 0 && raw[pos] === "[")) throw new InvalidKeyError(raw, "empty segment")

    pos = end

    while (raw[pos] === "[") {
      const close = raw.indexOf("]", pos)
      if (close === -1) throw new InvalidKeyError(raw, "unterminated bracket")

      const text = raw.slice(pos + 1, close)
      if (!text) throw new InvalidKeyError(raw, "empty index")
      if (!DIGITS.test(text)) throw new InvalidKeyError(raw, `non-numeric index "${text}"`)

      segments.push(toIndex(raw, text))
      pos = close + 1
    }

    if (pos === raw.length) return segments
    if (raw[pos] !== ".") {
      throw new InvalidKeyError(raw, `unexpected "${raw[pos]}" at position ${pos}`)
    }

    pos++
    if (pos === raw.length) throw new InvalidKeyError(raw, "empty segment")
  }

  return segments
}

export function keyOf(key: string | Key): Key {
  return typeof key === "string" ? parseKey(key) : key
}

/**
 * Canonical dotted form: `servers[0].host`. Total.
 */
export function toDotted(key: Key): string {
  let out = ""

  for (const segment of key) {
    if (typeof segment === "number") out += `[${segment}]`
    else out += out ? `.${segment}` : segment
  }

  return out
}

/**
 * Environment-variable form: `servers[1].host` → `SERVERS_1_HOST`,
 * `name_family` → `NAME__FAMILY`.
 */
export function toEnvVar(key: Key): string {
  return key
    .map((segment) =>
      typeof segment === "number" ? String(segment) : segment.toUpperCase().replaceAll("_", "__"),
    )
    .join("_")
}

/**
 * Inverse of {@link toEnvVar}. A single `_` separates segments, `__` is a literal underscore.
 */
export function fromEnvVar(raw: string): Key {
  if (!raw) return []

  const tokens: string[] = []
  let current = ""

  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i)

    if (ch !== "_") {
      current += ch
    } else if (raw[i + 1] === "_") {
      current += "_"
      i++
    } else {
      if (!current) throw new InvalidKeyError(raw, "empty segment")
      tokens.push(current)
      current = ""
    }
  }

  if (!current) throw new InvalidKeyError(raw, "empty segment")
  tokens.push(current)

  return tokens.map((token) => toSegment(raw, token))
}

/**
 * Segment-wise order: indices before names, indices numerically, names lexically,
 * a prefix before its extensions.
 */
export function compareKeys(a: Key, b: Key): number {
  const length = Math.min(a.length, b.length)

  for (let i = 0; i < length; i++) {
    const diff = compareSegments(a[i], b[i])
    if (diff !== 0) return diff
  }

  return a.length - b.length
}

function compareSegments(a: KeySegment | undefined, b: KeySegment | undefined): number {
  if (typeof a === "number" && typeof b === "number") return a - b
  if (typeof a === "number") return -1
  if (typeof b === "number") return 1
  if (a === b) return 0
  return (a ?? "") < (b ?? "") ? -1 : 1
}

export function keyEquals(a: Key, b: Key): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i])
}

export function isPrefixOf(prefix: Key, key: Key): boolean {
  return prefix.length <= key.length && prefix.every((segment, i) => segment === key[i])
}

export function childKey(key: Key, segment: KeySegment): Key {
  return [...key, segment]
}

/**
 * The key one level up, or `undefined` for the root.
 */
export function parentKey(key: Key): Key | undefined {
  return key.length ? key.slice(0, -1) : undefined
}
