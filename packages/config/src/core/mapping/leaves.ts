import type { ZodType } from "zod"
import type { Mapper } from "../../ports/mapper"
import { NotFoundError, ParseError, UnknownVariantError } from "../errors"

/**
 * Parses one resolved string into a value. Throws {@link ParseError} (or a more
 * specific config error) with `key` when the text is not acceptable.
 */
export interface LeafParser<T> {
  readonly typeName: string

  /**
   * Whether `""` is a value. When `false` an empty string counts as absent.
   * @default false
   */
  readonly acceptsEmpty?: boolean

  parse(text: string, key: string): T
}

export function leaf<T>(parser: LeafParser<T>): Mapper<T> {
  const acceptsEmpty = parser.acceptsEmpty ?? false

  return {
    typeName: parser.typeName,
    map(ctx) {
      const text = ctx.value(acceptsEmpty)
      if (text === undefined) throw new NotFoundError(ctx.dotted)

      return parser.parse(text, ctx.dotted)
    },
    describe(ctx) {
      const { default: fallback, description } = ctx.descriptor

      return [
        {
          key: ctx.path,
          type: parser.typeName,
          required: fallback === undefined,
          ...(fallback !== undefined && { default: fallback }),
          ...(description !== undefined && { description }),
        },
      ]
    },
  }
}

export function string(): Mapper<string> {
  return leaf({ typeName: "string", acceptsEmpty: true, parse: (text) => text })
}

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

export type IntegerRange<N> = {
  min?: N
  max?: N
}

function outOfRange(value: number | bigint, range: IntegerRange<number | bigint>): boolean {
  return (range.min !== undefined && value < range.min) || (range.max !== undefined && value > range.max)
}

function rangeName(base: string, range: IntegerRange<number | bigint>): string {
  if (range.min === undefined && range.max === undefined) return base

  return `${base}[${range.min ?? ""}..${range.max ?? ""}]`
}

/**
 * Decimal integer with an optional sign, within the safe integer range and `range`.
 */
export function int(range: IntegerRange<number> = {}): Mapper<number> {
  const typeName = rangeName("int", range)

  return leaf({
    typeName,
    parse(text, key) {
      const value = Number(text)

      if (!INTEGER.test(text) || !Number.isSafeInteger(value)) {
        throw new ParseError(key, text, typeName)
      }

      if (outOfRange(value, range)) throw new ParseError(key, text, typeName)

      return value || 0
    },
  })
}

/**
 * Decimal integer of any size, e.g. `random.i64` or 64-bit ids.
 */
export function bigint(range: IntegerRange<bigint> = {}): Mapper<bigint> {
  const typeName = rangeName("bigint", range)

  return leaf({
    typeName,
    parse(text, key) {
      const value = INTEGER.test(text) ? BigInt(text) : undefined

      if (value === undefined || outOfRange(value, range)) throw new ParseError(key, text, typeName)

      return value
    },
  })
}

export function float(): Mapper<number> {
  return leaf({
    typeName: "float",
    parse(text, key) {
      const value = Number(text)

      if (!DECIMAL.test(text) || !Number.isFinite(value)) {
        throw new ParseError(key, text, "float")
      }

      return value
    },
  })
}

const TRUE_WORDS = new Set(["true", "t", "yes", "y", "on", "1"])
const FALSE_WORDS = new Set(["false", "f", "no", "n", "off", "0"])

export function bool(): Mapper<boolean> {
  return leaf({
    typeName: "bool",
    parse(text, key) {
      const word = text.toLowerCase()

      if (TRUE_WORDS.has(word)) return true
      if (FALSE_WORDS.has(word)) return false

      throw new ParseError(key, text, "bool")
    },
  })
}

const DURATION = /^(\d+(?:\.\d+)?)(ms|us|ns|h|m|s)?$/

const MILLIS_PER_UNIT: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1000,
  ms: 1,
  us: 0.001,
  ns: 0.000_001,
}

/**
 * Duration in milliseconds from `<n>h`, `<n>m`, `<n>s`, `<n>ms`, `<n>us` or `<n>ns`.
 * A bare number is seconds.
 */
export function duration(): Mapper<number> {
  return leaf({
    typeName: "duration",
    parse(text, key) {
      const match = DURATION.exec(text.trim())
      const factor = MILLIS_PER_UNIT[match?.[2] ?? "s"]

      if (!match || factor === undefined) throw new ParseError(key, text, "duration")

      return Number(match[1]) * factor
    },
  })
}

/**
 * One of a fixed set of variants, matched case-insensitively.
 * The variant is returned as declared.
 */
export function enumeration<V extends string>(variants: readonly [V, ...V[]]): Mapper<V> {
  return leaf({
    typeName: `enum(${variants.join("|")})`,
    parse(text, key) {
      const wanted = text.toLowerCase()
      const variant = variants.find((v) => v.toLowerCase() === wanted)

      if (variant === undefined) throw new UnknownVariantError(key, text, variants)

      return variant
    },
  })
}

/**
 * Anything a Zod schema accepts from a string, e.g. `schema(z.url())` or
 * `schema(z.coerce.number().int().min(1).max(65535), "port")`.
 */
export function schema<T>(zodSchema: ZodType<T>, typeName = "schema"): Mapper<T> {
  return leaf({
    typeName,
    parse(text, key) {
      const result = zodSchema.safeParse(text)

      if (!result.success) throw new ParseError(key, text, typeName, result.error)

      return result.data
    },
  })
}
