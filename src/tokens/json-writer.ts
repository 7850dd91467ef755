import type { TokenSink } from "@/tokens/types"

export interface JsonWriterOptions {
  /** Spaces per nesting level; 0 writes compact output. Defaults to 0. */
  indent?: number
}

type Scope = {
  type: "object" | "array"
  count: number
  /** A field name was written and its value is pending */
  afterName: boolean
}

/**
 * Sink that writes JSON text
 *
 * @example
 * ```ts
 * const writer = new JsonWriter()
 * writer.writeStartObject()
 * writer.writeFieldName("a")
 * writer.writeNumber("1")
 * writer.writeEndObject()
 * writer.toString() // '{"a":1}'
 * ```
 */
export class JsonWriter implements TokenSink {
  #out: string = ""
  #scopes: Scope[] = []
  #indent: number

  constructor(options: JsonWriterOptions = {}) {
    this.#indent = options.indent ?? 0
  }

  writeStartObject(): void {
    this.#beforeValue()
    this.#out += "{"
    this.#scopes.push({ type: "object", count: 0, afterName: false })
  }

  writeEndObject(): void {
    this.#end("}")
  }

  writeStartArray(): void {
    this.#beforeValue()
    this.#out += "["
    this.#scopes.push({ type: "array", count: 0, afterName: false })
  }

  writeEndArray(): void {
    this.#end("]")
  }

  writeFieldName(name: string): void {
    const scope = this.#scopes[this.#scopes.length - 1]
    if (!scope || scope.type !== "object" || scope.afterName) {
      throw new Error(`field name "${name}" written outside of an object`)
    }

    if (scope.count > 0) this.#out += ","
    this.#newline(this.#scopes.length)
    this.#out += JSON.stringify(name) + (this.#indent > 0 ? ": " : ":")
    scope.afterName = true
    scope.count++
  }

  writeNull(): void {
    this.#raw("null")
  }

  writeString(value: string): void {
    this.#raw(JSON.stringify(value))
  }

  writeBoolean(value: boolean): void {
    this.#raw(value ? "true" : "false")
  }

  writeNumber(literal: string): void {
    this.#raw(literal)
  }

  flush(): void {}

  toString(): string {
    return this.#out
  }

  #raw(text: string): void {
    this.#beforeValue()
    this.#out += text
  }

  #beforeValue(): void {
    const scope = this.#scopes[this.#scopes.length - 1]
    if (!scope) return

    if (scope.type === "object") {
      if (!scope.afterName) throw new Error("object value written without a field name")
      scope.afterName = false
      return
    }

    if (scope.count > 0) this.#out += ","
    this.#newline(this.#scopes.length)
    scope.count++
  }

  #end(bracket: "}" | "]"): void {
    const scope = this.#scopes.pop()
    if (!scope || (scope.type === "object") !== (bracket === "}")) {
      throw new Error(`unbalanced '${bracket}'`)
    }

    if (scope.count > 0) this.#newline(this.#scopes.length)
    this.#out += bracket
  }

  #newline(depth: number): void {
    if (this.#indent > 0) {
      this.#out += "\n" + " ".repeat(this.#indent * depth)
    }
  }
}
