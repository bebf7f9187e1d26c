import { createNullLogger, type Logger } from "@stratum/logger"
import { MapSource, type PropertyValue } from "../adapters/map/map-source"
import type { Key, KeySegment } from "../ports/key"
import type { KeyDescription, Mapper } from "../ports/mapper"
import type { PropertySource, RawProperty } from "../ports/property-source"
import { NotFoundError } from "./errors"
import { compareKeys, isPrefixOf, keyOf, toDotted } from "./key"
import {
  descriptorOf,
  EnvironmentMappingContext,
  PathDescribeContext,
  type PropertyView,
} from "./mapping/context"
import {
  DEFAULT_TEMPLATE_CACHE_SIZE,
  PlaceholderResolver,
} from "./placeholder/placeholder-resolver"

/**
 * Conventional ranks. Lower is checked first.
 */
export const SourcePriority = {
  Override: 0,
  Args: 100,
  Env: 200,
  File: 300,
  Default: 1000,
} as const

export type AddSourceOptions = {
  /** @default SourcePriority.Default */
  priority?: number
}

export type RegisteredSource = Readonly<{
  name: string
  priority: number
}>

export type SourceRegistration = {
  source: PropertySource
  priority: number
  order: number
}

export type EnvironmentOptions = {
  /**
   * Expand `${...}` references in values.
   * @default true
   */
  placeholders: boolean

  /** Parsed templates kept per environment */
  templateCacheSize: number
}

export const OVERRIDES_SOURCE = "overrides"

/**
 * Frozen, ordered set of property sources.
 *
 * Values come from the first source, in priority order, that defines the key;
 * key enumeration is the union over all sources.
 */
export class Environment implements PropertyView {
  private readonly lookupOrder: readonly PropertySource[]
  private readonly registered: readonly RegisteredSource[]
  private readonly resolver: PlaceholderResolver

  constructor(
    registrations: readonly SourceRegistration[],
    private readonly options: EnvironmentOptions,
  ) {
    const ordered = [...registrations].sort((a, b) => a.priority - b.priority || a.order - b.order)

    this.lookupOrder = Object.freeze(ordered.map((r) => r.source))
    this.registered = Object.freeze(
      ordered.map((r) => Object.freeze({ name: r.source.name, priority: r.priority })),
    )
    this.resolver = new PlaceholderResolver(this, options.templateCacheSize)
  }

  static builder(): EnvironmentBuilder {
    return new EnvironmentBuilder()
  }

  /**
   * Raw value from the highest-priority source that defines `key`.
   */
  resolve(key: string | Key): RawProperty | undefined {
    const k = keyOf(key)

    for (const source of this.lookupOrder) {
      const value = source.get(k)
      if (value !== undefined) return { key: k, value, source: source.name }
    }

    return undefined
  }

  /**
   * Every key defined at or under `prefix` by any source, sorted.
   */
  enumerate(prefix: string | Key = []): Key[] {
    const p = keyOf(prefix)
    const seen = new Map<string, Key>()

    for (const source of this.lookupOrder) {
      for (const key of source.keys(p)) {
        if (isPrefixOf(p, key)) seen.set(toDotted(key), key)
      }
    }

    return [...seen.values()].sort(compareKeys)
  }

  childSegments(prefix: string | Key = []): KeySegment[] {
    const p = keyOf(prefix)
    const children = new Map<KeySegment, Key>()

    for (const key of this.enumerate(p)) {
      const segment = key[p.length]
      if (segment !== undefined && !children.has(segment)) children.set(segment, [segment])
    }

    return [...children.values()].sort(compareKeys).flatMap((k) => k)
  }

  contains(prefix: string | Key): boolean {
    const p = keyOf(prefix)

    return this.lookupOrder.some((s) => s.get(p) !== undefined || s.keys(p).length > 0)
  }

  /**
   * Placeholder-expanded value of `key`.
   */
  get(key: string | Key): string | undefined {
    const property = this.resolve(key)
    if (!property) return undefined

    return this.options.placeholders ? this.resolver.resolveProperty(property) : property.value
  }

  require(key: string | Key): string {
    const value = this.get(key)
    if (value === undefined) throw new NotFoundError(toDotted(keyOf(key)))

    return value
  }

  resolvePlaceholders(text: string): string {
    return this.options.placeholders ? this.resolver.resolve(text) : text
  }

  /**
   * Name of the source that provides `key`, if any.
   */
  explain(key: string | Key): string | undefined {
    return this.resolve(key)?.source
  }

  sources(): readonly RegisteredSource[] {
    return this.registered
  }

  /**
   * Map the properties under `prefix` (the mapper's own prefix when omitted, else the root).
   */
  map<T>(mapper: Mapper<T>, prefix?: string | Key): T {
    const key = keyOf(prefix ?? mapper.prefix ?? "")

    return mapper.map(new EnvironmentMappingContext(this, key, descriptorOf(mapper)))
  }

  describe(mapper: Mapper<unknown>, prefix?: string | Key): KeyDescription[] {
    const path = toDotted(keyOf(prefix ?? mapper.prefix ?? ""))

    return mapper.describe(new PathDescribeContext(path, descriptorOf(mapper)))
  }
}

export class EnvironmentBuilder {
  private readonly registrations: SourceRegistration[] = []
  private readonly overrides = new Map<string, PropertyValue>()
  private logger: Logger = createNullLogger()
  private options: EnvironmentOptions = {
    placeholders: true,
    templateCacheSize: DEFAULT_TEMPLATE_CACHE_SIZE,
  }

  addSource(source: PropertySource, options: AddSourceOptions = {}): this {
    const priority = options.priority ?? SourcePriority.Default

    this.registrations.push({ source, priority, order: this.registrations.length })
    this.logger.debug("Registered property source", { source: source.name, priority })

    return this
  }

  addSources(sources: Iterable<PropertySource>, options: AddSourceOptions = {}): this {
    for (const source of sources) this.addSource(source, options)

    return this
  }

  /**
   * Highest-priority value for `key`. A later `set` of the same key replaces the earlier one.
   */
  set(key: string | Key, value: PropertyValue): this {
    this.overrides.set(toDotted(keyOf(key)), value)

    return this
  }

  withLogger(logger: Logger): this {
    this.logger = logger.child({ component: "environment" })

    return this
  }

  withPlaceholders(enabled: boolean): this {
    this.options = { ...this.options, placeholders: enabled }

    return this
  }

  withTemplateCacheSize(size: number): this {
    this.options = { ...this.options, templateCacheSize: size }

    return this
  }

  build(): Environment {
    const registrations = [...this.registrations]

    if (this.overrides.size) {
      registrations.push({
        source: new MapSource(OVERRIDES_SOURCE, this.overrides),
        priority: SourcePriority.Override,
        order: -1,
      })
    }

    const env = new Environment(registrations, this.options)

    this.logger.debug("Environment built", {
      sources: env.sources().map((s) => s.name),
      placeholders: this.options.placeholders,
    })

    return env
  }
}
