import type { Key, KeySegment } from "../../ports/key"
import type {
  DescribeContext,
  FieldDescriptor,
  MappingContext,
  Mapper,
} from "../../ports/mapper"
import { childKey, toDotted } from "../key"

/**
 * What a mapping needs from an environment.
 */
export interface PropertyView {
  get(key: Key): string | undefined
  resolvePlaceholders(text: string): string
  contains(key: Key): boolean
  childSegments(key: Key): KeySegment[]
}

export function descriptorOf(mapper: Mapper<unknown>): FieldDescriptor {
  const declared = mapper.field

  return {
    ...(declared?.default !== undefined && { default: declared.default }),
    ...(declared?.description !== undefined && { description: declared.description }),
  }
}

function extend(key: Key, path: Key | KeySegment): Key {
  return typeof path === "object" ? [...key, ...path] : childKey(key, path)
}

export class EnvironmentMappingContext implements MappingContext {
  readonly dotted: string

  constructor(
    private readonly view: PropertyView,
    readonly key: Key,
    readonly descriptor: FieldDescriptor = {},
  ) {
    this.dotted = toDotted(key)
  }

  at(path: Key | KeySegment): MappingContext {
    return new EnvironmentMappingContext(this.view, extend(this.key, path))
  }

  withDescriptor(descriptor: FieldDescriptor): MappingContext {
    return new EnvironmentMappingContext(this.view, this.key, descriptor)
  }

  value(acceptsEmpty: boolean): string | undefined {
    const accept = (text: string | undefined) =>
      text !== undefined && (acceptsEmpty || text !== "")

    const found = this.view.get(this.key)
    if (accept(found)) return found

    const fallback = this.fallback()
    if (accept(fallback)) return fallback

    return undefined
  }

  present(): boolean {
    return this.descriptor.default !== undefined || this.view.contains(this.key)
  }

  childSegments(): KeySegment[] {
    return this.view.childSegments(this.key)
  }

  private fallback(): string | undefined {
    const raw = this.descriptor.default

    return raw === undefined ? undefined : this.view.resolvePlaceholders(raw)
  }
}

export class PathDescribeContext implements DescribeContext {
  constructor(
    readonly path: string,
    readonly descriptor: FieldDescriptor = {},
  ) {}

  at(path: Key): DescribeContext {
    const suffix = toDotted(path)

    if (!this.path) return new PathDescribeContext(suffix)
    if (!suffix) return new PathDescribeContext(this.path)

    return new PathDescribeContext(
      typeof path[0] === "number" ? this.path + suffix : `${this.path}.${suffix}`,
    )
  }

  element(): DescribeContext {
    return new PathDescribeContext(`${this.path}[*]`)
  }

  entry(): DescribeContext {
    return new PathDescribeContext(this.path ? `${this.path}.*` : "*")
  }

  withDescriptor(descriptor: FieldDescriptor): DescribeContext {
    return new PathDescribeContext(this.path, descriptor)
  }
}
