import type { KeySegment } from "../../ports/key"
import type { FieldSpec, KeyDescription, Mapper, MappingContext } from "../../ports/mapper"
import { MissingFieldError, NotFoundError } from "../errors"
import { childKey, isPrefixOf, keyOf, parseKey, toDotted } from "../key"
import { descriptorOf } from "./context"

export type FieldOptions = {
  /** Key segment (or dotted path) to read instead of the snake_case property name */
  key?: string
  /** Raw default; placeholders in it are expanded when it is used */
  default?: string | number | boolean
  description?: string
}

/**
 * Attach a default, a key rename or a description to a mapper.
 */
export function field<T>(mapper: Mapper<T>, options: FieldOptions): Mapper<T> {
  const merged: FieldSpec = {
    ...mapper.field,
    ...(options.key !== undefined && { key: options.key }),
    ...(options.default !== undefined && { default: String(options.default) }),
    ...(options.description !== undefined && { description: options.description }),
  }

  return {
    typeName: mapper.typeName,
    ...(mapper.prefix !== undefined && { prefix: mapper.prefix }),
    field: merged,
    map: (ctx) => mapper.map(ctx),
    describe: (ctx) => mapper.describe(ctx),
  }
}

/**
 * `undefined` when nothing is defined at or under the key and no default is declared.
 * Every other failure propagates.
 */
export function optional<T>(mapper: Mapper<T>): Mapper<T | undefined> {
  return {
    typeName: `${mapper.typeName}?`,
    ...(mapper.field && { field: mapper.field }),
    ...(mapper.prefix !== undefined && { prefix: mapper.prefix }),
    map(ctx) {
      if (!ctx.present()) return undefined

      try {
        return mapper.map(ctx)
      } catch (err) {
        if (err instanceof NotFoundError && err.key === ctx.dotted) return undefined
        throw err
      }
    },
    describe: (ctx) => notRequired(mapper.describe(ctx)),
  }
}

/**
 * Elements at the indices found under the key, in numeric order. Gaps are skipped;
 * an absent list is empty.
 */
export function list<T>(mapper: Mapper<T>): Mapper<T[]> {
  return {
    typeName: `${mapper.typeName}[]`,
    map: (ctx) => indices(ctx).map((i) => mapper.map(ctx.at(i))),
    describe: (ctx) => notRequired(mapper.describe(ctx.element())),
  }
}

/**
 * Distinct elements at the indices found under the key; the first occurrence keeps its place.
 */
export function set<T>(mapper: Mapper<T>): Mapper<Set<T>> {
  return {
    typeName: `set<${mapper.typeName}>`,
    map: (ctx) => new Set(indices(ctx).map((i) => mapper.map(ctx.at(i)))),
    describe: (ctx) => notRequired(mapper.describe(ctx.element())),
  }
}

export type NonEmptyArray<T> = [T, ...T[]]

export function isNonEmpty<T>(items: T[]): items is NonEmptyArray<T> {
  return items.length > 0
}

/**
 * A list that must have at least one element.
 */
export function nonEmpty<T>(mapper: Mapper<T[]>): Mapper<NonEmptyArray<T>> {
  return {
    typeName: mapper.typeName,
    ...(mapper.field && { field: mapper.field }),
    map(ctx) {
      const items = mapper.map(ctx)
      if (!isNonEmpty(items)) throw new NotFoundError(toDotted(childKey(ctx.key, 0)))

      return items
    },
    describe: (ctx) => mapper.describe(ctx),
  }
}

/**
 * Every named child of the key, mapped by `mapper`.
 */
export function record<T>(mapper: Mapper<T>): Mapper<Record<string, T>> {
  return {
    typeName: `record<${mapper.typeName}>`,
    map(ctx) {
      const names = ctx.childSegments().filter((s): s is string => typeof s === "string")

      return Object.fromEntries(names.map((name) => [name, mapper.map(ctx.at(name))]))
    },
    describe: (ctx) => notRequired(mapper.describe(ctx.entry())),
  }
}

export type StructFields = Record<string, Mapper<unknown>>

export type StructValue<F extends StructFields> = {
  [K in keyof F]: F[K] extends Mapper<infer T> ? T : never
}

export type StructOptions = {
  /** Key the struct is read from when `env.map()` is given no prefix */
  prefix?: string
  typeName?: string
}

/**
 * Map each property under `<key>.<snake_case property>` (or the field's declared key).
 * Nested structs extend the key of the field that holds them.
 */
export function struct<F extends StructFields>(
  fields: F,
  options: StructOptions = {},
): Mapper<StructValue<F>> {
  const entries = Object.entries(fields).map(([property, mapper]) => ({
    property,
    mapper,
    key: keyOf(mapper.field?.key ?? toSnakeCase(property)),
    descriptor: descriptorOf(mapper),
  }))

  return {
    typeName: options.typeName ?? "struct",
    ...(options.prefix !== undefined && { prefix: options.prefix }),
    map(ctx) {
      const out: Record<string, unknown> = {}

      for (const { property, mapper, key, descriptor } of entries) {
        out[property] = mapField(ctx.at(key).withDescriptor(descriptor), mapper, property)
      }

      return out as StructValue<F>
    },
    describe(ctx) {
      return entries.flatMap(({ mapper, key, descriptor }) =>
        mapper.describe(ctx.at(key).withDescriptor(descriptor)),
      )
    },
  }
}

function mapField(ctx: MappingContext, mapper: Mapper<unknown>, property: string): unknown {
  try {
    return mapper.map(ctx)
  } catch (err) {
    if (
      err instanceof NotFoundError &&
      err.key !== ctx.dotted &&
      !ctx.present() &&
      isPrefixOf(ctx.key, parseKey(err.key))
    ) {
      throw new MissingFieldError(ctx.dotted, property, mapper.field?.description, err)
    }
    throw err
  }
}

function indices(ctx: MappingContext): number[] {
  return ctx.childSegments().filter((s: KeySegment): s is number => typeof s === "number")
}

function notRequired(descriptions: KeyDescription[]): KeyDescription[] {
  return descriptions.map((d) => ({ ...d, required: false }))
}

/**
 * `maxIdle` → `max_idle`, `httpURL` → `http_url`.
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .toLowerCase()
}
