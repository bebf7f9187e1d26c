import type { Key } from "../../ports/key"
import type { RawProperty } from "../../ports/property-source"
import { CircularReferenceError, InvalidKeyError, NotFoundError } from "../errors"
import { parseKey, toDotted } from "../key"
import { LruMap } from "./lru-map"
import { hasPlaceholders, parseTemplate, type ReferenceNode, type Template } from "./template"

export interface PropertyLookup {
  resolve(key: Key): RawProperty | undefined
}

export const DEFAULT_TEMPLATE_CACHE_SIZE = 256

/**
 * Expands `${key}` and `${key:fallback}` references against a {@link PropertyLookup}.
 *
 * Referenced values are expanded recursively. The keys being expanded are tracked
 * per top-level call; meeting one of them again raises {@link CircularReferenceError}.
 * A fallback is only evaluated when its key is missing.
 */
export class PlaceholderResolver {
  private readonly templates: LruMap<string, Template>

  constructor(
    private readonly lookup: PropertyLookup,
    cacheSize = DEFAULT_TEMPLATE_CACHE_SIZE,
  ) {
    this.templates = new LruMap(cacheSize)
  }

  /**
   * Expand a free-standing string.
   */
  resolve(text: string): string {
    return this.expandText(text, [])
  }

  /**
   * Expand a property's raw value. The property's own key counts as being expanded,
   * so `a = ${a}` is reported as a cycle.
   */
  resolveProperty(property: RawProperty): string {
    return this.expandText(property.value, [toDotted(property.key)])
  }

  private expandText(text: string, stack: string[]): string {
    if (!hasPlaceholders(text)) return text

    return this.expand(this.parse(text), stack)
  }

  private parse(text: string): Template {
    const cached = this.templates.get(text)
    if (cached) return cached

    const template = parseTemplate(text)
    this.templates.set(text, template)

    return template
  }

  private expand(template: Template, stack: string[]): string {
    let out = ""

    for (const node of template) {
      out += node.kind === "text" ? node.value : this.substitute(node, stack)
    }

    return out
  }

  private substitute(node: ReferenceNode, stack: string[]): string {
    const name = this.expand(node.key, stack)
    if (!name) throw new InvalidKeyError(name, "empty placeholder key")

    const key = parseKey(name)
    const dotted = toDotted(key)

    if (stack.includes(dotted)) throw new CircularReferenceError(dotted, stack)

    const property = this.lookup.resolve(key)

    if (property) {
      stack.push(dotted)
      try {
        return this.expandText(property.value, stack)
      } finally {
        stack.pop()
      }
    }

    if (node.fallback) return this.expand(node.fallback, stack)

    throw new NotFoundError(dotted)
  }
}
