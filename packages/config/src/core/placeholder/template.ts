import { InvalidPlaceholderError } from "../errors"

export type TextNode = { readonly kind: "text"; readonly value: string }

/**
 * `${key}` or `${key:fallback}`. Both parts are templates of their own so that
 * references can nest: `${app.${profile}.url}`, `${a:${b:c}}`.
 */
export type ReferenceNode = {
  readonly kind: "reference"
  readonly key: Template
  readonly fallback?: Template
}

export type TemplateNode = TextNode | ReferenceNode

export type Template = readonly TemplateNode[]

const ESCAPABLE = new Set(["$", "{", "}", ":", "\\"])

/**
 * `true` when `text` may contain a reference or an escape and needs parsing.
 */
export function hasPlaceholders(text: string): boolean {
  return text.includes("${") || text.includes("\\")
}

/**
 * Parse a raw value into text and reference nodes.
 *
 * `\` before `$ { } : \` yields that character; any other `\`, a `$` not followed
 * by `{`, and `{` / `}` outside a reference are plain text.
 */
export function parseTemplate(input: string): Template {
  return new TemplateParser(input).sequence("top")
}

type Scope = "top" | "key" | "fallback"

class TemplateParser {
  private pos = 0

  constructor(private readonly input: string) {}

  sequence(scope: Scope): TemplateNode[] {
    const nodes: TemplateNode[] = []
    let text = ""

    const flush = () => {
      if (text) nodes.push({ kind: "text", value: text })
      text = ""
    }

    while (this.pos < this.input.length) {
      const ch = this.input.charAt(this.pos)

      if (scope !== "top" && ch === "}") break
      if (scope === "key" && ch === ":") break

      if (ch === "\\") {
        const next = this.input.charAt(this.pos + 1)

        if (ESCAPABLE.has(next)) {
          text += next
          this.pos += 2
        } else {
          text += ch
          this.pos++
        }
        continue
      }

      if (ch === "$" && this.input.charAt(this.pos + 1) === "{") {
        flush()
        nodes.push(this.reference())
        continue
      }

      text += ch
      this.pos++
    }

    flush()

    return nodes
  }

  private reference(): ReferenceNode {
    const start = this.pos
    this.pos += 2

    const key = this.sequence("key")
    let fallback: TemplateNode[] | undefined

    if (this.input.charAt(this.pos) === ":") {
      this.pos++
      fallback = this.sequence("fallback")
    }

    if (this.input.charAt(this.pos) !== "}") {
      throw new InvalidPlaceholderError(this.input, start, "unterminated placeholder")
    }

    this.pos++

    return fallback === undefined ? { kind: "reference", key } : { kind: "reference", key, fallback }
  }
}
