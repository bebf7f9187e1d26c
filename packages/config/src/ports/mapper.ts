import type { Key, KeySegment } from "./key"

/**
 * Per-field metadata declared with `field()`.
 */
export type FieldSpec = {
  /** Key (segment or dotted path) the field is read from, instead of its snake_case property name */
  readonly key?: string
  /** Raw value used when the key is absent. Placeholder-expanded and parsed like a source value. */
  readonly default?: string
  readonly description?: string
}

export type FieldDescriptor = Pick<FieldSpec, "default" | "description">

/**
 * One line of the documentation produced by `describe()`.
 */
export type KeyDescription = {
  /** Dotted key; list elements are written `[*]`, map entries `*` */
  key: string
  type: string
  required: boolean
  default?: string
  description?: string
}

/**
 * View over one key of an environment while a value is being mapped.
 */
export interface MappingContext {
  readonly key: Key
  readonly dotted: string
  readonly descriptor: FieldDescriptor

  /** Context for a key below this one, without a descriptor. */
  at(path: Key | KeySegment): MappingContext
  withDescriptor(descriptor: FieldDescriptor): MappingContext

  /**
   * Resolved value at this key, falling back to the descriptor default.
   * Unless `acceptsEmpty`, an empty string counts as absent.
   */
  value(acceptsEmpty: boolean): string | undefined

  /** `true` when anything is defined at or under this key, or a default is declared. */
  present(): boolean

  /** Distinct next segments below this key: indices first (numerically), then names. */
  childSegments(): KeySegment[]
}

/**
 * Mirror of {@link MappingContext} used to document keys without reading values.
 */
export interface DescribeContext {
  readonly path: string
  readonly descriptor: FieldDescriptor

  at(path: Key): DescribeContext
  /** Any list element: `path[*]` */
  element(): DescribeContext
  /** Any map entry: `path.*` */
  entry(): DescribeContext
  withDescriptor(descriptor: FieldDescriptor): DescribeContext
}

/**
 * Converts the properties at and under a key into a typed value.
 */
export interface Mapper<T> {
  readonly typeName: string

  /** Key the value is read from when the caller gives none */
  readonly prefix?: string

  /** Field metadata, set by `field()` and kept by wrappers such as `optional()` */
  readonly field?: FieldSpec

  map(ctx: MappingContext): T
  describe(ctx: DescribeContext): KeyDescription[]
}
